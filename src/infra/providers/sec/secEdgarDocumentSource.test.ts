import { afterEach, describe, expect, it, vi } from "vitest";
import type { FilingReference } from "../../../core/entities/filing";
import { SecEdgarDocumentSource } from "./secEdgarDocumentSource";

const TICKERS_URL = "https://www.sec.gov/files/company_tickers.json";
const ARCHIVES_URL = "https://www.sec.gov/Archives/edgar/data";

const submission = {
  name: "Acme Corp",
  filings: {
    recent: {
      form: ["10-K", "10-Q", "S-1", "8-K", "8-K", "8-K"],
      accessionNumber: [
        "0001234567-25-000004",
        "0001234567-25-000009",
        "0001234567-25-000001",
        "0001234567-25-000011",
        "0001234567-25-000012",
        "",
      ],
      filingDate: [
        "2025-02-14",
        "2025-10-31",
        "2025-01-02",
        "2025-11-04",
        "11/05/2025",
        "2025-11-06",
      ],
      primaryDocument: [
        "acme-10k.htm",
        "acme-10q.htm",
        "acme-s1.htm",
        "acme-8k.htm",
        "acme-8k-2.htm",
        "acme-8k-3.htm",
      ],
    },
  },
};

const stubEdgar = (routes: Record<string, () => Response>) => {
  const calls: Array<{ url: string; headers: unknown }> = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: Parameters<typeof fetch>[0], init?: Parameters<typeof fetch>[1]) => {
      const url = String(input);
      calls.push({ url, headers: init?.headers });
      const route = routes[url];
      return route ? route() : new Response("not found", { status: 404 });
    }),
  );
  return calls;
};

const json = (payload: unknown) => () =>
  new Response(JSON.stringify(payload), { status: 200 });

const createSource = () =>
  new SecEdgarDocumentSource(
    "https://data.sec.gov",
    ARCHIVES_URL,
    TICKERS_URL,
    "filing-index test@example.com",
  );

const reference = (sourceUrl: string): FilingReference => ({
  ticker: "ACME",
  filingType: "10-K",
  filingDate: "2025-02-14",
  accessionNo: "0001234567-25-000004",
  sourceUrl,
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("SecEdgarDocumentSource", () => {
  it("maps recent submissions to filing references of the wanted types", async () => {
    const calls = stubEdgar({
      [TICKERS_URL]: json({ "0": { ticker: "ACME", cik_str: 1234567 } }),
      "https://data.sec.gov/submissions/CIK0001234567.json": json(submission),
    });

    const result = await createSource().listFilings("acme", ["10-K", "8-K"]);

    expect(result._unsafeUnwrap()).toEqual([
      {
        ticker: "ACME",
        filingType: "10-K",
        filingDate: "2025-02-14",
        accessionNo: "0001234567-25-000004",
        sourceUrl: `${ARCHIVES_URL}/1234567/000123456725000004/acme-10k.htm`,
      },
      {
        ticker: "ACME",
        filingType: "8-K",
        filingDate: "2025-11-04",
        accessionNo: "0001234567-25-000011",
        sourceUrl: `${ARCHIVES_URL}/1234567/000123456725000011/acme-8k.htm`,
      },
    ]);
    expect(calls[0]?.headers).toMatchObject({ "User-Agent": "filing-index test@example.com" });
  });

  it("caches the ticker mapping between listings", async () => {
    const calls = stubEdgar({
      [TICKERS_URL]: json({ "0": { ticker: "ACME", cik_str: 1234567 } }),
      "https://data.sec.gov/submissions/CIK0001234567.json": json(submission),
    });
    const source = createSource();

    await source.listFilings("ACME", ["10-K"]);
    await source.listFilings("ACME", ["10-Q"]);

    expect(calls.filter((call) => call.url === TICKERS_URL)).toHaveLength(1);
  });

  it("reports an unknown ticker as not found", async () => {
    stubEdgar({ [TICKERS_URL]: json({ "0": { ticker: "ACME", cik_str: 1234567 } }) });

    const error = (await createSource().listFilings("ZZZZ", ["10-K"]))._unsafeUnwrapErr();

    expect(error).toMatchObject({
      source: "filings",
      code: "not_found",
      provider: "sec-edgar",
      message: "No SEC registrant found for ticker ZZZZ.",
      retryable: false,
    });
  });

  it("returns the primary document markup", async () => {
    const url = `${ARCHIVES_URL}/1234567/000123456725000004/acme-10k.htm`;
    stubEdgar({ [url]: () => new Response("<html>annual report</html>") });

    const result = await createSource().fetchDocument(reference(url));

    expect(result._unsafeUnwrap().markup).toBe("<html>annual report</html>");
  });

  it("rejects PDF documents by extension or content", async () => {
    const bodyUrl = `${ARCHIVES_URL}/1234567/000123456725000004/scan.htm`;
    const calls = stubEdgar({ [bodyUrl]: () => new Response("%PDF-1.7 ...") });
    const source = createSource();

    const byExtension = await source.fetchDocument(reference(`${ARCHIVES_URL}/1/2/scan.pdf`));
    const byContent = await source.fetchDocument(reference(bodyUrl));

    expect(byExtension._unsafeUnwrapErr().code).toBe("unsupported_document");
    expect(byContent._unsafeUnwrapErr().message).toBe(
      `PDF filings are not supported: ${bodyUrl}`,
    );
    expect(calls.map((call) => call.url)).toEqual([bodyUrl]);
  });

  it("maps a missing document to a non-retryable not found", async () => {
    stubEdgar({});

    const error = (
      await createSource().fetchDocument(reference(`${ARCHIVES_URL}/1/2/missing.htm`))
    )._unsafeUnwrapErr();

    expect(error.code).toBe("not_found");
    expect(error.httpStatus).toBe(404);
    expect(error.retryable).toBe(false);
  });

  it("requires a User-Agent", () => {
    expect(
      () => new SecEdgarDocumentSource("https://data.sec.gov", ARCHIVES_URL, TICKERS_URL, " "),
    ).toThrow("SEC_EDGAR_USER_AGENT is required");
  });
});
