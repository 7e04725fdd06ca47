/**
 * Terminal output for descriptors, proposals and apply results, plus the
 * approval prompt.
 */

import * as readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import * as path from "node:path";
import chalk from "chalk";
import type { AudioFileDescriptor } from "../config/types.js";
import type { Proposal, ProposalOption } from "../decision/types.js";
import type { ApplyResult, Approval } from "../apply/types.js";
import { getAudioFormat } from "../audio/formats.js";

function formatDuration(seconds: number | undefined): string {
  if (seconds === undefined) return "unknown";
  const total = Math.round(seconds);
  return `${Math.floor(total / 60)}:${String(total % 60).padStart(2, "0")}`;
}

/** Lines describing a file as read from disk */
export function formatDescriptor(descriptor: AudioFileDescriptor): string[] {
  const format = getAudioFormat(descriptor.path);
  const lines = [
    `File:     ${descriptor.path}`,
    `Format:   ${format ? `${format.name} (${format.compression})` : descriptor.container || "unknown"}` +
      ` tags=${descriptor.tagModel}`,
    `Duration: ${formatDuration(descriptor.durationSeconds)}`,
  ];
  if (descriptor.sampleRate !== undefined) {
    lines.push(
      `Audio:    ${descriptor.sampleRate} Hz` +
        (descriptor.channelCount !== undefined ? `, ${descriptor.channelCount} ch` : "") +
        (descriptor.bitrate !== undefined ? `, ${Math.round(descriptor.bitrate / 1000)} kbps` : "")
    );
  }

  const tags = Object.entries(descriptor.existingTags);
  lines.push(tags.length > 0 ? "Tags:" : "Tags:     (none)");
  for (const [key, value] of tags.sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`  ${key}=${value}`);
  }
  return lines;
}

function formatOption(label: string, option: ProposalOption, current: AudioFileDescriptor): string[] {
  const source =
    option.candidateRank !== null ? ` from #${option.candidateRank} ${option.sourceKind ?? ""}`.trimEnd() : "";
  const lines = [
    chalk.bold(`${label} ${option.category || "(no category)"}${source}`) +
      (option.usedFallback ? chalk.yellow(" [template]") : ""),
    `    → ${option.destinationPath || "(no destination)"}`,
  ];
  for (const [key, value] of Object.entries(option.tags)) {
    const before = current.existingTags[key];
    const changed = before !== value;
    const shown = `${key}=${value}`;
    lines.push(
      `      ${changed ? chalk.green(shown) : shown}` +
        (changed && before ? chalk.gray(` (was ${before})`) : "")
    );
  }
  if (option.missingFields.length > 0) {
    lines.push(chalk.yellow(`      missing: ${option.missingFields.join(", ")}`));
  }
  for (const note of option.notes) {
    lines.push(chalk.gray(`      - ${note}`));
  }
  return lines;
}

/** Lines describing a proposal and its options */
export function formatProposal(proposal: Proposal, descriptor: AudioFileDescriptor): string[] {
  const status =
    proposal.status === "Proposed" ? chalk.green(proposal.status) : chalk.yellow(proposal.status);
  const lines = [
    "",
    "=".repeat(70),
    `${path.basename(proposal.filePath)}  ${status}  score=${proposal.confidence.toFixed(3)}`,
    "=".repeat(70),
    ...formatOption("[1]", proposal.primary, descriptor),
  ];
  proposal.alternates.forEach((alternate, i) => {
    lines.push(...formatOption(`[${i + 2}]`, alternate, descriptor));
  });
  for (const issue of proposal.issues) {
    const rank = issue.candidateRank !== null ? ` #${issue.candidateRank}` : "";
    lines.push(chalk.yellow(`  ! ${issue.stage}/${issue.check}${rank}: ${issue.message}`));
  }
  return lines;
}

export function printProposal(proposal: Proposal, descriptor: AudioFileDescriptor): void {
  for (const line of formatProposal(proposal, descriptor)) {
    console.log(line);
  }
}

/**
 * Interpret one answer at the approval prompt. Returns undefined for input
 * that is not a valid choice here.
 */
export function parseApproval(
  answer: string,
  proposal: Proposal,
  quarantineAvailable: boolean
): Approval | undefined {
  const trimmed = answer.trim().toLowerCase();

  if (trimmed === "s" || trimmed === "skip" || trimmed === "n") {
    return { action: "skip" };
  }
  if ((trimmed === "q" || trimmed === "quarantine") && quarantineAvailable) {
    return { action: "quarantine" };
  }
  if (proposal.status !== "Proposed") {
    return undefined;
  }

  const options = [proposal.primary, ...proposal.alternates];
  const num = parseInt(trimmed, 10);
  if (num >= 1 && num <= options.length) {
    return { action: "apply", option: options[num - 1] };
  }
  return undefined;
}

function choicesFor(proposal: Proposal, quarantineAvailable: boolean): string {
  const choices: string[] = [];
  if (proposal.status === "Proposed") {
    const count = 1 + proposal.alternates.length;
    choices.push(count === 1 ? "[1] apply" : `[1-${count}] apply`);
  }
  choices.push("[s]kip");
  if (quarantineAvailable) choices.push("[q]uarantine");
  return choices.join(", ");
}

/**
 * Ask the human what to do with a proposal. The readline interface exists
 * only for the duration of the question. Returns null on Ctrl-C.
 */
export async function promptApproval(
  proposal: Proposal,
  quarantineAvailable: boolean
): Promise<Approval | null> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  const interrupted = new AbortController();
  rl.on("SIGINT", () => interrupted.abort());

  try {
    while (true) {
      const answer = await rl.question(`${choicesFor(proposal, quarantineAvailable)}: `, {
        signal: interrupted.signal,
      });
      const approval = parseApproval(answer, proposal, quarantineAvailable);
      if (approval) return approval;
      console.log(`Invalid selection. Choose ${choicesFor(proposal, quarantineAvailable)}.`);
    }
  } catch (e) {
    if (interrupted.signal.aborted) return null;
    throw e;
  } finally {
    rl.close();
  }
}

export function formatResult(result: ApplyResult): string {
  const name = path.basename(result.filePath);
  switch (result.outcome) {
    case "Applied":
      return chalk.green(`✓ ${name} → ${result.targetPath ?? ""}`);
    case "Skipped":
      return chalk.gray(`- ${name} skipped${result.error ? ` (${result.error.message})` : ""}`);
    case "QuarantinedDuplicate":
    case "QuarantinedUnresolved":
      return chalk.yellow(`⚠ ${name} ${result.outcome} → ${result.targetPath ?? ""}`);
    case "Failed":
      return chalk.red(
        `✗ ${name} failed at ${result.error?.stage ?? "?"} [${result.error?.code ?? "?"}]: ` +
          `${result.error?.message ?? ""}`
      );
  }
}

/** Count per outcome, in a fixed order */
export function summarizeResults(results: readonly ApplyResult[]): string {
  const order = ["Applied", "Skipped", "QuarantinedDuplicate", "QuarantinedUnresolved", "Failed"] as const;
  return order
    .map((outcome) => [outcome, results.filter((r) => r.outcome === outcome).length] as const)
    .filter(([, count]) => count > 0)
    .map(([outcome, count]) => `${outcome}: ${count}`)
    .join(", ");
}
