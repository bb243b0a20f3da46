import { Classification, Inquiry } from "../types/inquiry";

/** Scores at or above this reach the team channel */
export const HIGH_PRIORITY_THRESHOLD = 4;

type SlackBlock = Record<string, unknown>;

export type SlackMessage = {
  text: string;
  blocks: SlackBlock[];
};

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type NotifyResult = {
  posted: boolean;
  error?: string;
};

export interface Notifier {
  notify(inquiry: Inquiry, classification: Classification): Promise<NotifyResult>;
}

/**
 * Only a numeric score can qualify; "5" or "high" never alerts
 */
export function isHighPriority(classification: Classification): boolean {
  return (
    typeof classification.alignmentScore === "number" &&
    classification.alignmentScore >= HIGH_PRIORITY_THRESHOLD
  );
}

/**
 * Slack incoming-webhook payload for a high-priority opportunity
 */
export function buildSlackMessage(inquiry: Inquiry, classification: Classification): SlackMessage {
  const company = inquiry.companyName ?? "Unknown company";
  const score = classification.alignmentScore ?? "N/A";

  return {
    text: `🚀 High-Priority Opportunity: *${company}* (Score: ${score}/5)`,
    blocks: [
      {
        type: "section",
        text: { type: "mrkdwn", text: `🚀 *High-Priority Opportunity: ${company}*` },
      },
      {
        type: "section",
        fields: [
          { type: "mrkdwn", text: `*Alignment Score:*\n${score}/5` },
          { type: "mrkdwn", text: `*Contact:*\n${inquiry.contactEmail ?? "N/A"}` },
        ],
      },
      {
        type: "section",
        text: { type: "mrkdwn", text: `*Summary:*\n${classification.summary ?? "N/A"}` },
      },
      {
        type: "section",
        text: {
          type: "mrkdwn",
          text: `*Suggested Next Step:*\n>${classification.suggestedNextStep ?? "N/A"}`,
        },
      },
    ],
  };
}

/**
 * Post to the webhook when the score meets the threshold
 * Anything but a 200 is logged and reported, never thrown
 */
export async function notifyIfHighPriority(
  inquiry: Inquiry,
  classification: Classification,
  options: { webhookUrl: string; fetchFn?: FetchFn }
): Promise<NotifyResult> {
  if (!isHighPriority(classification)) {
    console.log("[notifier] Skipping Slack alert for low-priority item");
    return { posted: false };
  }

  if (!options.webhookUrl) {
    console.warn("[notifier] SLACK_WEBHOOK_URL not configured, skipping alert");
    return { posted: false, error: "SLACK_WEBHOOK_URL missing" };
  }

  const fetchFn = options.fetchFn ?? fetch;

  try {
    const response = await fetchFn(options.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=utf-8" },
      body: JSON.stringify(buildSlackMessage(inquiry, classification)),
    });

    if (response.status === 200) {
      console.log("[notifier] Slack alert sent");
      return { posted: true };
    }

    const body = await response.text();
    console.error(`[notifier] Failed to send Slack alert. Status: ${response.status}, Response: ${body}`);
    return { posted: false, error: `slack-error-${response.status}` };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[notifier] Slack request error:", message);
    return { posted: false, error: message };
  }
}

export function createSlackNotifier(webhookUrl: string, fetchFn?: FetchFn): Notifier {
  return {
    notify: (inquiry, classification) =>
      notifyIfHighPriority(inquiry, classification, { webhookUrl, fetchFn }),
  };
}
