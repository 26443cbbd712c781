import type { DocumentSourcePort } from "../../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import {
  isFilingType,
  type FilingDocument,
  type FilingReference,
  type FilingType,
} from "../../../core/entities/filing";
import { err, ok, type Result } from "neverthrow";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";
import { toBoundaryError } from "../../llm/boundaryErrors";

type EdgarTickerRecord = {
  ticker?: string;
  cik_str?: number;
};

type EdgarTickersResponse = Record<string, EdgarTickerRecord>;

type EdgarRecentFilings = {
  form?: string[];
  accessionNumber?: string[];
  filingDate?: string[];
  primaryDocument?: string[];
};

type EdgarSubmissionResponse = {
  name?: string;
  filings?: {
    recent?: EdgarRecentFilings;
  };
};

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const asAccessionPathPart = (accessionNo: string): string =>
  accessionNo.replaceAll("-", "");

const isPdf = (url: string, body?: string): boolean =>
  /\.pdf$/i.test(url) || (body?.trimStart().startsWith("%PDF") ?? false);

/**
 * Lists recent 10-K, 10-Q and 8-K filings from EDGAR submissions and fetches
 * their primary HTML documents. SEC requires a descriptive User-Agent.
 */
export class SecEdgarDocumentSource implements DocumentSourcePort {
  private readonly symbolToCik = new Map<string, string>();

  constructor(
    private readonly baseUrl: string,
    private readonly archivesBaseUrl: string,
    private readonly tickersUrl: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error(
        "SEC_EDGAR_USER_AGENT is required when the SEC EDGAR document source is enabled.",
      );
    }
  }

  async listFilings(
    ticker: string,
    filingTypes: readonly FilingType[],
  ): Promise<Result<FilingReference[], AppBoundaryError>> {
    const symbol = ticker.toUpperCase();
    const cikResult = await this.resolveCik(symbol);
    if (cikResult.isErr()) {
      return err(cikResult.error);
    }

    if (!cikResult.value) {
      return err({
        source: "filings",
        code: "not_found",
        provider: "sec-edgar",
        message: `No SEC registrant found for ticker ${symbol}.`,
        retryable: false,
      });
    }

    const cik = cikResult.value;
    const submission = await this.fetchJson<EdgarSubmissionResponse>(
      new URL(`/submissions/CIK${cik}.json`, this.baseUrl).toString(),
    );
    if (submission.isErr()) {
      return err(submission.error);
    }

    return ok(
      this.toReferences(symbol, cik, submission.value, new Set(filingTypes)),
    );
  }

  async fetchDocument(
    reference: FilingReference,
  ): Promise<Result<FilingDocument, AppBoundaryError>> {
    if (isPdf(reference.sourceUrl)) {
      return err(this.unsupported(reference));
    }

    const response = await this.httpClient.requestText({
      url: reference.sourceUrl,
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 500,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (response.isErr()) {
      return err(this.toError(response.error));
    }

    if (isPdf(reference.sourceUrl, response.value)) {
      return err(this.unsupported(reference));
    }

    return ok({ ...reference, markup: response.value });
  }

  /**
   * Ticker-to-CIK lookups are cached for the life of the process.
   */
  private async resolveCik(
    symbol: string,
  ): Promise<Result<string | null, AppBoundaryError>> {
    const cached = this.symbolToCik.get(symbol);
    if (cached) {
      return ok(cached);
    }

    const response = await this.fetchJson<EdgarTickersResponse>(this.tickersUrl);
    if (response.isErr()) {
      return err(response.error);
    }

    if (!response.value || typeof response.value !== "object") {
      return err({
        source: "filings",
        code: "malformed_response",
        provider: "sec-edgar",
        message: "SEC ticker mapping payload was malformed.",
        retryable: false,
      });
    }

    for (const record of Object.values(response.value)) {
      const ticker = record.ticker?.trim().toUpperCase();
      const cikValue = record.cik_str;
      if (!ticker || !Number.isInteger(cikValue)) {
        continue;
      }

      this.symbolToCik.set(ticker, String(cikValue).padStart(10, "0"));
    }

    return ok(this.symbolToCik.get(symbol) ?? null);
  }

  private toReferences(
    symbol: string,
    cik: string,
    submission: EdgarSubmissionResponse,
    wanted: Set<FilingType>,
  ): FilingReference[] {
    const recent = submission.filings?.recent;
    const forms = recent?.form ?? [];
    const accessionNumbers = recent?.accessionNumber ?? [];
    const filingDates = recent?.filingDate ?? [];
    const primaryDocuments = recent?.primaryDocument ?? [];

    const references: FilingReference[] = [];

    for (let index = 0; index < forms.length; index += 1) {
      const form = forms[index]?.trim().toUpperCase() ?? "";
      const accessionNo = accessionNumbers[index]?.trim();
      const filingDate = filingDates[index]?.trim();
      const primaryDocument = primaryDocuments[index]?.trim();

      if (!isFilingType(form) || !wanted.has(form)) {
        continue;
      }

      if (!accessionNo || !filingDate || !ISO_DATE.test(filingDate) || !primaryDocument) {
        continue;
      }

      references.push({
        ticker: symbol,
        filingType: form,
        filingDate,
        accessionNo,
        sourceUrl: `${this.archivesBaseUrl}/${Number.parseInt(cik, 10)}/${asAccessionPathPart(accessionNo)}/${primaryDocument}`,
      });
    }

    return references;
  }

  private async fetchJson<T>(
    url: string,
  ): Promise<Result<T, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<T>({
      url,
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 300,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "application/json",
      },
    });

    return response.isErr() ? err(this.toError(response.error)) : ok(response.value);
  }

  private toError(failure: HttpClientError): AppBoundaryError {
    if (failure.httpStatus === 404) {
      return {
        source: "filings",
        code: "not_found",
        provider: "sec-edgar",
        message: failure.message,
        retryable: false,
        httpStatus: 404,
      };
    }

    return toBoundaryError("filings", "sec-edgar", failure);
  }

  private unsupported(reference: FilingReference): AppBoundaryError {
    return {
      source: "filings",
      code: "unsupported_document",
      provider: "sec-edgar",
      message: `PDF filings are not supported: ${reference.sourceUrl}`,
      retryable: false,
    };
  }
}
