import { Resend } from "resend";

import { DEFAULT_REQUEST_TIMEOUT_MS, withTimeout } from "../utils/http";

export type OutgoingEmail = {
  to: string;
  subject: string;
  html: string;
};

export interface EmailSender {
  /** Returns the provider's message id. */
  send(email: OutgoingEmail): Promise<string>;
}

export class EmailSendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmailSendError";
  }
}

export type ResendClientLike = {
  emails: {
    send(args: {
      from: string;
      to: string[];
      subject: string;
      html: string;
    }): Promise<{
      data?: { id?: string | null } | null;
      error?: { message?: string | null } | null;
    }>;
  };
};

export class ResendEmailSender implements EmailSender {
  private readonly resend: ResendClientLike;
  private readonly timeoutMs: number;

  constructor(
    private readonly from: string,
    options: { apiKey?: string; client?: ResendClientLike; timeoutMs?: number },
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    if (options.client) {
      this.resend = options.client;
    } else if (options.apiKey && options.apiKey.trim().length > 0) {
      this.resend = new Resend(options.apiKey);
    } else {
      throw new EmailSendError("RESEND_API_KEY is not configured.");
    }
  }

  async send(email: OutgoingEmail): Promise<string> {
    const { data, error } = await withTimeout(
      this.resend.emails.send({
        from: this.from,
        to: [email.to],
        subject: email.subject,
        html: email.html,
      }),
      this.timeoutMs,
      () => new EmailSendError(`Resend did not answer within ${this.timeoutMs}ms.`),
    );

    if (error || !data?.id) {
      throw new EmailSendError(error?.message ?? "Failed to send email via Resend.");
    }

    return data.id;
  }
}
