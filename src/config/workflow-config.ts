/**
 * Workflow configuration file
 *
 * Declares the providers (base URL and optional credential) and, per stage,
 * the abilities it needs and the provider(s) serving them:
 *
 * ```yaml
 * default_server: COMMON
 * servers:
 *   COMMON: { url: http://localhost:8001 }
 *   ATLAS:  { url: http://localhost:8002, api_key_env: ATLAS_API_KEY }
 * stages:
 *   - name: UNDERSTAND
 *     abilities: [parse_request_text, extract_entities]
 *     servers: [COMMON, ATLAS]
 *   - name: ASK
 *     abilities: [clarify_question]
 *     server: ATLAS
 * ```
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { config } from "./index.js";

export class WorkflowConfigError extends Error {
  readonly name = "WorkflowConfigError";

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkflowConfigError);
    }
  }
}

const ServerSchema = z.object({
  url: z.string().url(),
  /** Name of the environment variable holding the provider credential. */
  api_key_env: z.string().min(1).optional(),
});

const StageSchema = z
  .object({
    name: z.string().min(1),
    abilities: z.array(z.string().min(1)).default([]),
    server: z.string().min(1).optional(),
    servers: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
  })
  .transform((stage) => ({
    name: stage.name,
    abilities: stage.abilities,
    // a non-empty `servers` takes precedence over `server`; either may be a single id
    binding: stage.servers !== undefined && stage.servers.length > 0 ? stage.servers : stage.server,
  }));

export const WorkflowFileSchema = z.object({
  default_server: z.string().min(1).default("COMMON"),
  servers: z.record(ServerSchema),
  stages: z.array(StageSchema).min(1),
});

export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;
export type StageBinding = WorkflowFile["stages"][number];

export interface ProviderEndpoint {
  name: string;
  url: string;
  apiKey?: string;
}

export interface WorkflowConfig {
  defaultProvider: string;
  providers: ProviderEndpoint[];
  stages: StageBinding[];
}

/**
 * Validate an already-parsed document and resolve credentials / URL
 * overrides from the environment.
 */
export function parseWorkflowConfig(
  doc: unknown,
  env: NodeJS.ProcessEnv = process.env,
): WorkflowConfig {
  const result = WorkflowFileSchema.safeParse(doc);
  if (!result.success) {
    throw new WorkflowConfigError(
      "Invalid workflow configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }

  const file = result.data;
  const urlOverrides: Record<string, string | undefined> = {
    COMMON: config.workflow.commonProviderUrl,
    ATLAS: config.workflow.atlasProviderUrl,
  };

  const providers = Object.entries(file.servers).map(([name, server]): ProviderEndpoint => {
    const apiKey = server.api_key_env ? env[server.api_key_env] : undefined;
    return {
      name,
      url: urlOverrides[name] ?? server.url,
      ...(apiKey ? { apiKey } : {}),
    };
  });

  return {
    defaultProvider: file.default_server,
    providers,
    stages: file.stages,
  };
}

/**
 * Read and validate the workflow YAML file.
 *
 * @param path defaults to config.workflow.configPath
 */
export async function loadWorkflowConfig(path: string = config.workflow.configPath): Promise<WorkflowConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorkflowConfigError(`Cannot read workflow configuration at ${path}`, [message]);
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new WorkflowConfigError(`Workflow configuration at ${path} is not valid YAML`, [error.message]);
    }
    throw error;
  }

  return parseWorkflowConfig(doc);
}
