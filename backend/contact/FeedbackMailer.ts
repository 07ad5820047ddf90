import { ConfidentialClientApplication, type AuthenticationResult } from "@azure/msal-node";
import type { AppConfig } from "../config";
import { describeError } from "../domain/Errors";
import type { FetchLike } from "../maps/MapsClient";

// Contact form relay
// - App-only mail: client-credentials token from MSAL, then /users/{sender}/sendMail.
// - Every failure path still returns a mailto: link the user can open instead.

const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
const GRAPH_BASE = "https://graph.microsoft.com/v1.0";
const LOGIN_BASE = "https://login.microsoftonline.com";

export type ContactMessage = Readonly<{
  name?: string;
  email?: string;
  subject?: string;
  message: string;
}>;

export type ContactOutcome = Readonly<{
  sent: boolean;
  info: string;
  missing?: readonly string[];
  fallbackUrl?: string;
}>;

export function formatAddress(name: string | undefined, email: string | undefined, fallbackEmail = ""): string {
  return `${name || "N/A"} <${email || fallbackEmail}>`;
}

export function mailtoFallbackLink(to: string, appName: string, msg: ContactMessage): string {
  const subject = `${appName} - ${msg.subject || "Contact"}`;
  const body = `From: ${formatAddress(msg.name, msg.email, "noreply@example.com")}\n\n${msg.message}`;
  return `mailto:${to}?${new URLSearchParams({ subject, body }).toString()}`;
}

export function buildMessageBody(appName: string, msg: ContactMessage): string {
  return (
    `New ${appName} contact form submission\n\n` +
    `From: ${formatAddress(msg.name, msg.email)}\n` +
    `Subject: ${msg.subject || "Contact"}\n\n` +
    `Message:\n${msg.message}\n`
  );
}

export class FeedbackMailer {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  // Kept for the mailer's lifetime so MSAL serves the cached token until it expires.
  private credentials?: ConfidentialClientApplication;

  constructor(
    private readonly mail: AppConfig["mail"],
    options: { fetchImpl?: FetchLike; timeoutMs?: number } = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  missingSettings(): string[] {
    const settings: [string, string | undefined][] = [
      ["MAIL_TENANT_ID", this.mail.tenantId],
      ["MAIL_CLIENT_ID", this.mail.clientId],
      ["MAIL_CLIENT_SECRET", this.mail.clientSecret],
      ["MAIL_SENDER", this.mail.sender],
    ];
    return settings.filter(([, v]) => !v).map(([k]) => k);
  }

  private async acquireToken(tenantId: string, clientId: string, clientSecret: string): Promise<string> {
    if (!this.credentials) {
      this.credentials = new ConfidentialClientApplication({
        auth: { clientId, clientSecret, authority: `${LOGIN_BASE}/${tenantId}` },
      });
    }

    let result: AuthenticationResult | null;
    try {
      result = await this.credentials.acquireTokenByClientCredential({ scopes: [GRAPH_SCOPE] });
    } catch (err) {
      throw new Error(`Auth error: ${describeError(err)}`, { cause: err });
    }

    if (!result?.accessToken) throw new Error("Auth error: no access token returned.");
    return result.accessToken;
  }

  private async sendMail(sender: string, token: string, subject: string, body: string): Promise<void> {
    const res = await this.fetchImpl(`${GRAPH_BASE}/users/${encodeURIComponent(sender)}/sendMail`, {
      method: "POST",
      headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
      body: JSON.stringify({
        message: {
          subject,
          body: { contentType: "Text", content: body },
          toRecipients: [{ emailAddress: { address: this.mail.contactTo } }],
        },
        saveToSentItems: true,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (res.status !== 200 && res.status !== 202) {
      throw new Error(`Send failed: ${res.status} ${await res.text()}`);
    }
  }

  async send(msg: ContactMessage): Promise<ContactOutcome> {
    if (!msg.message.trim()) throw new Error("Please enter a message.");

    const fallbackUrl = mailtoFallbackLink(this.mail.contactTo, this.mail.appName, msg);
    const { tenantId, clientId, clientSecret, sender } = this.mail;

    if (!tenantId || !clientId || !clientSecret || !sender) {
      return { sent: false, info: "Mail relay is not configured.", missing: this.missingSettings(), fallbackUrl };
    }

    try {
      const token = await this.acquireToken(tenantId, clientId, clientSecret);
      await this.sendMail(
        sender,
        token,
        msg.subject || `${this.mail.appName} - Contact Form`,
        buildMessageBody(this.mail.appName, msg),
      );
      console.log("[Contact] Message relayed");
      return { sent: true, info: "Message sent." };
    } catch (err) {
      const info = describeError(err);
      console.warn(`[Contact] Relay failed: ${info}`);
      return { sent: false, info, fallbackUrl };
    }
  }
}
