import { buildUrl, createTimeoutFetch, FetchLike } from "../utils/http";
import { AccessTokenProvider, googleRequest } from "./googleAuth";

const SHEETS_API_BASE = "https://sheets.googleapis.com/v4";

export type SheetRow = string[];

export interface SheetReader {
  readRange(range: string): Promise<SheetRow[]>;
}

type ValuesResponse = {
  values?: unknown[][];
};

export class GoogleSheetsClient implements SheetReader {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly auth: AccessTokenProvider,
    private readonly spreadsheetId: string,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? createTimeoutFetch();
  }

  async readRange(range: string): Promise<SheetRow[]> {
    const url = buildUrl(
      SHEETS_API_BASE,
      `/spreadsheets/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(range)}`,
    );
    const data = await googleRequest<ValuesResponse>(this.fetchImpl, this.auth, url);

    return (data.values ?? []).map((row) =>
      row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))),
    );
  }
}
