import { randomUUID } from "crypto";
import { AppConfig } from "../config";
import { selectNewInquiries } from "../mappers/inquiry";
import { SheetsGateway, createSheetsGateway } from "./sheets";
import { TextGenerator, classifyDescription, createGeminiGenerator } from "./classifier";
import { Notifier, createSlackNotifier } from "./notifier";
import { OpportunityStore, createOpportunityStore } from "../db/opportunities";
import { Inquiry, InquiryOutcome, RunSummary } from "../types/inquiry";

export interface PipelineDeps {
  sheets: SheetsGateway;
  generator: TextGenerator;
  store: OpportunityStore;
  notifier: Notifier;
}

/**
 * Wire the production clients from config
 */
export function createPipelineDeps(config: Readonly<AppConfig>): PipelineDeps {
  return {
    sheets: createSheetsGateway(config),
    generator: createGeminiGenerator(config.geminiApiKey, config.geminiModel),
    store: createOpportunityStore(config.dbFile),
    notifier: createSlackNotifier(config.slackWebhookUrl),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify -> store -> notify -> write back, for one inquiry
 * Store and write-back failures are contained to this inquiry
 */
export async function processInquiry(inquiry: Inquiry, deps: PipelineDeps): Promise<InquiryOutcome> {
  const base = { rowNumber: inquiry.rowNumber, companyName: inquiry.companyName };

  console.log(`[pipeline] Processing inquiry from: ${inquiry.companyName ?? "(no company)"} (row ${inquiry.rowNumber})`);

  if (!inquiry.description) {
    console.log("[pipeline] Skipping inquiry with no description");
    return { ...base, result: "skipped", reason: "no_description" };
  }

  const classification = await classifyDescription(inquiry.description, deps.generator);
  if (!classification) {
    console.log("[pipeline] Skipping due to AI analysis failure");
    return { ...base, result: "skipped", reason: "classification_failed" };
  }

  let opportunityId: number;
  try {
    opportunityId = await deps.store.insert(inquiry, classification);
  } catch (error) {
    console.error(`[pipeline] Store failed for row ${inquiry.rowNumber}:`, errorMessage(error));
    return { ...base, result: "failed", stage: "store", error: errorMessage(error), opportunityId: null };
  }

  const notification = await deps.notifier.notify(inquiry, classification);

  try {
    await deps.sheets.writeBack(inquiry.rowNumber, classification);
  } catch (error) {
    // The stored row stays; the sheet row will be picked up again next run
    console.error(`[pipeline] Write-back failed for row ${inquiry.rowNumber}:`, errorMessage(error));
    return { ...base, result: "failed", stage: "write_back", error: errorMessage(error), opportunityId };
  }

  return {
    ...base,
    result: "processed",
    opportunityId,
    alignmentScore: classification.alignmentScore,
    notified: notification.posted,
  };
}

/**
 * One pipeline run over the current sheet snapshot
 * Throws only when the sheet cannot be read
 */
export async function runPipeline(deps: PipelineDeps): Promise<RunSummary> {
  const runId = randomUUID();
  const startedAt = new Date().toISOString();

  console.log(`[pipeline] Starting run ${runId}`);

  const rows = await deps.sheets.readRows();
  const inquiries = selectNewInquiries(rows);

  console.log(`[pipeline] Found ${inquiries.length} new inquiries`);

  const outcomes: InquiryOutcome[] = [];
  for (const inquiry of inquiries) {
    outcomes.push(await processInquiry(inquiry, deps));
  }

  const summary: RunSummary = {
    runId,
    startedAt,
    finishedAt: new Date().toISOString(),
    fetched: inquiries.length,
    processed: outcomes.filter((o) => o.result === "processed").length,
    skipped: outcomes.filter((o) => o.result === "skipped").length,
    failed: outcomes.filter((o) => o.result === "failed").length,
    outcomes,
  };

  console.log(
    `[pipeline] Run ${runId} finished: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed`
  );

  return summary;
}
