import { buildSlackMessage, notifyIfHighPriority, createSlackNotifier, isHighPriority } from "../notifier";
import { AiValue, Classification, Inquiry } from "../../types/inquiry";

const WEBHOOK = "https://hooks.example.test/webhook";

const inquiry: Inquiry = {
  rowNumber: 2,
  timestamp: "1/1/2026",
  companyName: "Acme",
  contactEmail: "founder@acme.test",
  companyWebsite: "acme.test",
  description: "Logistics SaaS",
  status: null,
  fields: {},
};

const classification = (alignmentScore: AiValue): Classification => ({
  summary: "B2B SaaS for logistics",
  alignmentScore,
  suggestedNextStep: "Schedule initial screening call",
});

function okFetch(status = 200) {
  return jest.fn(async (_url: string, _init: RequestInit) => new Response("ok", { status }));
}

describe("Chat notifier", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("isHighPriority", () => {
    it("should gate on a score of 4 or more", () => {
      expect(isHighPriority(classification(3))).toBe(false);
      expect(isHighPriority(classification(4))).toBe(true);
      expect(isHighPriority(classification(5))).toBe(true);
      expect(isHighPriority(classification(null))).toBe(false);
    });

    it("should never qualify a non-numeric score", () => {
      expect(isHighPriority(classification("5"))).toBe(false);
      expect(isHighPriority(classification("high"))).toBe(false);
    });
  });

  describe("buildSlackMessage", () => {
    it("should build the text line and four section blocks", () => {
      const message = buildSlackMessage(inquiry, classification(5));

      expect(message.text).toBe("🚀 High-Priority Opportunity: *Acme* (Score: 5/5)");
      expect(message.blocks).toEqual([
        { type: "section", text: { type: "mrkdwn", text: "🚀 *High-Priority Opportunity: Acme*" } },
        {
          type: "section",
          fields: [
            { type: "mrkdwn", text: "*Alignment Score:*\n5/5" },
            { type: "mrkdwn", text: "*Contact:*\nfounder@acme.test" },
          ],
        },
        { type: "section", text: { type: "mrkdwn", text: "*Summary:*\nB2B SaaS for logistics" } },
        {
          type: "section",
          text: { type: "mrkdwn", text: "*Suggested Next Step:*\n>Schedule initial screening call" },
        },
      ]);
    });
  });

  describe("notifyIfHighPriority", () => {
    it("should post exactly once for a high score", async () => {
      const fetchFn = okFetch();

      const result = await notifyIfHighPriority(inquiry, classification(4), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: true });
      expect(fetchFn).toHaveBeenCalledTimes(1);
      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe(WEBHOOK);
      expect(init.method).toBe("POST");
      expect(JSON.parse(String(init.body))).toEqual(buildSlackMessage(inquiry, classification(4)));
    });

    it("should not post for a low score", async () => {
      const fetchFn = okFetch();

      const result = await notifyIfHighPriority(inquiry, classification(3), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: false });
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it("should not post when the score is missing", async () => {
      const fetchFn = okFetch();

      await notifyIfHighPriority(inquiry, classification(null), { webhookUrl: WEBHOOK, fetchFn });

      expect(fetchFn).not.toHaveBeenCalled();
    });

    it("should report a non-2xx response without throwing", async () => {
      const fetchFn = okFetch(500);

      const result = await notifyIfHighPriority(inquiry, classification(5), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: false, error: "slack-error-500" });
    });

    it("should treat any status other than 200 as not sent", async () => {
      const fetchFn = jest.fn(async (_url: string, _init: RequestInit) => new Response(null, { status: 204 }));

      const result = await notifyIfHighPriority(inquiry, classification(5), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: false, error: "slack-error-204" });
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it("should not post when the score arrived as text", async () => {
      const fetchFn = okFetch();

      const result = await notifyIfHighPriority(inquiry, classification("high"), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: false });
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it("should report a network error without throwing", async () => {
      const fetchFn = jest.fn(async (_url: string, _init: RequestInit): Promise<Response> => {
        throw new Error("getaddrinfo ENOTFOUND");
      });

      const result = await notifyIfHighPriority(inquiry, classification(5), { webhookUrl: WEBHOOK, fetchFn });

      expect(result).toEqual({ posted: false, error: "getaddrinfo ENOTFOUND" });
    });

    it("should skip when no webhook is configured", async () => {
      const fetchFn = okFetch();

      const result = await notifyIfHighPriority(inquiry, classification(5), { webhookUrl: "", fetchFn });

      expect(result).toEqual({ posted: false, error: "SLACK_WEBHOOK_URL missing" });
      expect(fetchFn).not.toHaveBeenCalled();
    });
  });

  describe("createSlackNotifier", () => {
    it("should post through the injected fetch", async () => {
      const fetchFn = okFetch();
      const notifier = createSlackNotifier(WEBHOOK, fetchFn);

      expect(await notifier.notify(inquiry, classification(5))).toEqual({ posted: true });
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });
  });
});
