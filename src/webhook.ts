import { createHmac } from "node:crypto";
import { z } from "zod";
import type { WebhookPayload } from "./types.js";
import { logger } from "./logger.js";

export type WebhookConfig = {
  url?: string;
  secret?: string;
  token?: string;
  channel?: string;
};

const slackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional()
});

export function isWebhookConfigured(config: WebhookConfig) {
  return Boolean(config.url || (config.token && config.channel));
}

export async function sendWebhook(
  config: WebhookConfig,
  payload: WebhookPayload,
  text: string,
  fetchImpl: typeof fetch = globalThis.fetch
): Promise<void> {
  const { url, secret, token, channel } = config;

  // Slack takes precedence when both are configured.
  if (token && channel) {
    await sendSlackMessage(fetchImpl, token, channel, text);
    return;
  }

  if (!url) return;

  const body = JSON.stringify(payload);
  const headers: Record<string, string> = {
    "content-type": "application/json"
  };

  if (secret) {
    headers["x-signature"] = signPayload(secret, body);
  }

  const response = await fetchImpl(url, {
    method: "POST",
    headers,
    body
  });

  if (!response.ok) {
    const responseText = await response.text();
    logger.warn("webhook.send.failed", {
      status: response.status,
      body: responseText
    });
    throw new Error(`Webhook failed: ${response.status} ${responseText}`);
  }
}

async function sendSlackMessage(
  fetchImpl: typeof fetch,
  token: string,
  channel: string,
  text: string
) {
  const response = await fetchImpl("https://slack.com/api/chat.postMessage", {
    method: "POST",
    headers: {
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json; charset=utf-8"
    },
    body: JSON.stringify({ channel, text })
  });

  const result = slackResponseSchema.safeParse(await response.json());
  if (!result.success || !result.data.ok) {
    const error = result.success ? result.data.error : "unexpected response";
    logger.warn("slack.message.failed", { error });
    throw new Error(`Slack message failed: ${error}`);
  }
}

export function signPayload(secret: string, body: string) {
  return createHmac("sha256", secret).update(body).digest("hex");
}

export function buildNotificationText(payload: WebhookPayload, summaryLine: string) {
  const mode = payload.dryRun ? " (dry run)" : "";
  const lines = [
    `*Netflix top 10 requests${mode}* for ${payload.countries.join(", ")}`,
    summaryLine
  ];
  if (payload.summaryUri) {
    lines.push(`Summary: ${payload.summaryUri}`);
  }
  return lines.join("\n");
}
