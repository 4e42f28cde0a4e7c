import { createTimeoutFetch, FetchLike, parseJsonResponse } from "../utils/http";

const SLACK_API_BASE = "https://slack.com/api";

export interface ChatClient {
  sendDirectMessage(userId: string, text: string): Promise<string>;
}

export class SlackError extends Error {
  constructor(
    message: string,
    readonly code: string | null = null,
  ) {
    super(message);
    this.name = "SlackError";
  }
}

type SlackResponse = {
  ok?: boolean;
  error?: string;
  channel?: { id?: string } | string;
  ts?: string;
};

export class SlackClient implements ChatClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly botToken: string,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? createTimeoutFetch();
  }

  /** Opens (or reuses) the bot's DM with the user and posts into it. Returns the message ts. */
  async sendDirectMessage(userId: string, text: string): Promise<string> {
    const opened = await this.call("conversations.open", { users: userId });
    const channelId = typeof opened.channel === "object" ? opened.channel.id : undefined;
    if (!channelId) {
      throw new SlackError(`Slack opened no DM channel for ${userId}.`);
    }

    const posted = await this.call("chat.postMessage", { channel: channelId, text });
    return posted.ts ?? "";
  }

  private async call(method: string, body: Record<string, string>): Promise<SlackResponse> {
    const response = await this.fetchImpl(`${SLACK_API_BASE}/${method}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.botToken}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify(body),
    });

    if (response.status >= 400) {
      throw new SlackError(`Slack ${method} HTTP ${response.status}: ${await response.text()}`);
    }

    const data = await parseJsonResponse<SlackResponse>(response);
    if (!data.ok) {
      throw new SlackError(`Slack ${method} failed: ${data.error ?? "unknown_error"}`, data.error ?? null);
    }
    return data;
  }
}
