// Call Insight - Report Export
// Opt-in saving of an analyzed call's report and conversation to disk.
//
// Privacy: calls live in server memory only until an operator asks for an
// export. Once saved, the files are the operator's responsibility. Exports
// are never read back.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CallSummary, ConversationTurn, Report } from "./types.js";

const ROLE_NAMES: Record<ConversationTurn["role"], string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
};

/**
 * Renders the report.txt content: a call metadata header, the category
 * scores, the CSI and the model's narrative.
 */
export function formatReport(call: CallSummary, report: Report): string {
  const lines: string[] = [];

  lines.push("=== Customer Service Call Report ===");
  lines.push("");
  lines.push(`Call ID: ${call.id}`);
  lines.push(`Analyzed: ${call.analyzedAt ?? "N/A"}`);
  if (call.escalation?.escalate) {
    lines.push(`Escalated: yes (${call.escalation.reason ?? "no reason recorded"})`);
    lines.push(`Supervisor notified: ${call.notificationWarning ? `failed (${call.notificationWarning})` : "yes"}`);
  } else {
    lines.push("Escalated: no");
  }
  lines.push("");
  lines.push("---");
  lines.push("");

  for (const [category, score] of Object.entries(report.scores)) {
    lines.push(`${category}: ${score}/10`);
  }
  if (report.missingCategories.length > 0) {
    lines.push(`Not scored: ${report.missingCategories.join(", ")}`);
  }
  lines.push(`Customer Satisfaction Index: ${report.csi.toFixed(1)}/10`);
  lines.push("");
  lines.push(report.narrative);

  return lines.join("\n");
}

/**
 * Renders the conversation.txt content, one block per turn:
 *   Assistant:
 *   ...
 */
export function formatConversation(turns: readonly ConversationTurn[]): string {
  return turns.map((turn) => `${ROLE_NAMES[turn.role]}:\n${turn.content}`).join("\n\n");
}

/**
 * Generates the output directory name from a call.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{callId}`
 */
export function buildDirectoryName(call: Pick<CallSummary, "id" | "createdAt">): string {
  const date = new Date(call.createdAt);
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${call.id}`;
}

/**
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{callId}/
 *     report.txt
 *     report.json
 *     conversation.txt
 */
export class ReportExporter {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /**
   * @returns Array of file paths that were written.
   * @throws Error if the call has no report.
   */
  async saveCall(call: CallSummary): Promise<string[]> {
    if (!call.report) {
      throw new Error(`Call ${call.id} has no report to save`);
    }

    const dirPath = join(this.baseDir, buildDirectoryName(call));
    await mkdir(dirPath, { recursive: true });

    const savedPaths: string[] = [];

    const reportPath = join(dirPath, "report.txt");
    await writeFile(reportPath, formatReport(call, call.report), "utf-8");
    savedPaths.push(reportPath);

    const jsonPath = join(dirPath, "report.json");
    const jsonContent = JSON.stringify(
      {
        callId: call.id,
        createdAt: call.createdAt,
        analyzedAt: call.analyzedAt,
        report: call.report,
        escalation: call.escalation,
        notified: call.notified,
        notificationWarning: call.notificationWarning,
      },
      null,
      2,
    );
    await writeFile(jsonPath, jsonContent, "utf-8");
    savedPaths.push(jsonPath);

    const conversationPath = join(dirPath, "conversation.txt");
    await writeFile(conversationPath, formatConversation(call.conversation), "utf-8");
    savedPaths.push(conversationPath);

    return savedPaths;
  }
}
