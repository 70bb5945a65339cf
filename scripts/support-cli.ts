#!/usr/bin/env node
/**
 * Support workflow CLI
 *
 * Runs one request through the workflow against the providers named in the
 * workflow file and prints the result.
 *
 * Usage (from repo root):
 *
 *   # Built-in sample request
 *   tsx scripts/support-cli.ts --demo
 *
 *   # Caller-supplied request: inline JSON, a file path, or "-" for stdin
 *   tsx scripts/support-cli.ts --input '{"customer_name":"Sam","query":"Where is my order?"}'
 *
 *   # Full run result as JSON instead of the pretty summary
 *   tsx scripts/support-cli.ts --demo --output json
 */

import "dotenv/config";

import { readFile } from "node:fs/promises";

import { loadWorkflowConfig } from "../src/config/workflow-config.js";
import { isPresent } from "../src/utils/is-present.js";
import { createSupportWorkflow } from "../src/workflow/index.js";
import { SupportInputSchema, type SupportInput } from "../src/workflow/state.js";
import type { SupportRunResult } from "../src/workflow/types.js";

type OutputMode = "pretty" | "json";

export interface CliOptions {
  demo: boolean;
  input?: string;
  output: OutputMode;
  workflowPath?: string;
}

export const DEMO_INPUT: SupportInput = {
  customer_name: "Aisha Jain",
  email: "AISHA@EXAMPLE.COM ",
  query: "My order #A123 arrived damaged. Need a replacement ASAP.",
  priority: "High",
  ticket_id: "TCK-1001",
  clarification_answer: "Ship replacement to: 221B Baker Street, London.",
};

export const SUMMARY_FIELDS = [
  "customer_name",
  "email",
  "priority",
  "ticket_id",
  "intent",
  "sentiment",
  "entities",
  "normalized",
  "enriched",
  "flags",
  "customer_history",
  "solution_score",
  "escalated",
  "ticket_updates",
  "closed",
  "draft_response",
  "ai_response",
  "api_actions",
  "notifications",
] as const;

export function parseArgs(argv: string[]): CliOptions {
  let demo = false;
  let input: string | undefined;
  let output: OutputMode = "pretty";
  let workflowPath: string | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--demo") {
      demo = true;
    } else if (arg === "--input" || arg === "-i") {
      input = argv[i + 1];
      if (input === undefined) {
        throw new Error("--input requires a value");
      }
      i += 1;
    } else if (arg === "--output" || arg === "-o") {
      const value = argv[i + 1];
      if (value === "pretty" || value === "json") {
        output = value;
      } else {
        throw new Error(`Unknown --output value: ${value}`);
      }
      i += 1;
    } else if (arg === "--workflow" || arg === "-w") {
      workflowPath = argv[i + 1];
      i += 1;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (demo && input !== undefined) {
    throw new Error("Use either --demo or --input, not both");
  }
  if (!demo && input === undefined) {
    throw new Error("Provide --demo or --input <json|file|->");
  }

  return { demo, input, output, workflowPath };
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

/** Inline JSON when the value starts with "{", stdin for "-", otherwise a file path. */
export async function resolveInput(options: CliOptions): Promise<SupportInput> {
  if (options.demo || options.input === undefined) {
    return DEMO_INPUT;
  }

  const value = options.input.trim();
  let raw: string;
  if (value.startsWith("{")) {
    raw = value;
  } else if (value === "-") {
    raw = await readStdin();
  } else {
    raw = await readFile(value, "utf8");
  }

  return SupportInputSchema.parse(JSON.parse(raw));
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Summary of the non-empty fields followed by the execution logs, read from
 * the run output.
 */
export function formatRunSummaryPretty(result: SupportRunResult): string {
  const source = result.output;
  const lines: string[] = [`=== Support run ${result.run_id} (branch: ${result.branch ?? "none"}) ===`];

  for (const field of SUMMARY_FIELDS) {
    const value = source[field];
    if (isPresent(value)) {
      lines.push(`${field}: ${formatValue(value)}`);
    }
  }

  const logs = Array.isArray(source.logs)
    ? source.logs.filter((line): line is string => typeof line === "string")
    : result.logs;

  lines.push("", "--- Execution logs ---");
  logs.forEach((line, index) => lines.push(`${index + 1}. ${line}`));

  return lines.join("\n");
}

async function main() {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("[support-cli] Argument error:", error instanceof Error ? error.message : String(error));
    process.exit(1);
    return;
  }

  let input: SupportInput;
  try {
    input = await resolveInput(options);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("[support-cli] Invalid input:", error instanceof Error ? error.message : String(error));
    process.exit(1);
    return;
  }

  const { engine } = createSupportWorkflow(await loadWorkflowConfig(options.workflowPath));
  const result = await engine.run(input);

  if (options.output === "json") {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(result, null, 2));
  } else {
    // eslint-disable-next-line no-console
    console.log(formatRunSummaryPretty(result));
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("[support-cli] Unexpected error:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
