import { createTimeoutFetch, FetchLike, parseJsonResponse } from "../utils/http";

const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
const EXPIRY_MARGIN_MS = 60_000;

export class GoogleApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "GoogleApiError";
  }
}

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export type GoogleAuthOptions = {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  fetchImpl?: FetchLike;
  now?: () => number;
};

type TokenResponse = {
  access_token?: string;
  expires_in?: number;
};

/** Exchanges the long-lived refresh token for access tokens, reusing each until shortly before it expires. */
export class GoogleAuth implements AccessTokenProvider {
  private readonly fetchImpl: FetchLike;

  private readonly now: () => number;

  private cached: { token: string; expiresAt: number } | null = null;

  constructor(private readonly options: GoogleAuthOptions) {
    this.fetchImpl = options.fetchImpl ?? createTimeoutFetch();
    this.now = options.now ?? Date.now;
  }

  async getAccessToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - EXPIRY_MARGIN_MS) {
      return this.cached.token;
    }

    const body = new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      refresh_token: this.options.refreshToken,
      grant_type: "refresh_token",
    });

    const response = await this.fetchImpl(GOOGLE_TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });

    if (!response.ok) {
      throw new GoogleApiError(
        `Google token refresh failed (${response.status}): ${await response.text()}`,
        response.status,
      );
    }

    const data = await parseJsonResponse<TokenResponse>(response);
    if (!data.access_token) {
      throw new GoogleApiError("Google token refresh returned no access_token.");
    }

    this.cached = {
      token: data.access_token,
      expiresAt: this.now() + (data.expires_in ?? 3600) * 1000,
    };
    return data.access_token;
  }
}

export async function googleRequest<T>(
  fetchImpl: FetchLike,
  auth: AccessTokenProvider,
  url: string,
  init: { method?: string; body?: unknown } = {},
): Promise<T> {
  const token = await auth.getAccessToken();
  const response = await fetchImpl(url, {
    method: init.method ?? "GET",
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
    },
    body: init.body === undefined ? undefined : JSON.stringify(init.body),
  });

  if (!response.ok) {
    throw new GoogleApiError(
      `Google API ${response.status}: ${await response.text()}`,
      response.status,
    );
  }

  return parseJsonResponse<T>(response);
}
