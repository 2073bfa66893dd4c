/**
 * Tool Creation
 *
 * `defineTool()` pairs a zod input schema with a handler. The returned
 * `ResearchTool` is type-erased for the registry: `run()` validates raw
 * arguments against the schema and only then calls the typed handler, so
 * argument shapes are checked before dispatch.
 */

import { z } from "zod";
import { ToolError, type ToolName } from "@citeline/shared";
import type { TurnHandle } from "../session/session.js";
import type { PageFetcher, SearchProvider } from "../collaborators/types.js";
import type { ToolSpec } from "../model/model.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Successful tool output; serialized into the transcript for the model.
 */
export type ToolPayload = Record<string, unknown>;

export interface ToolLimits {
  maxSearchResults: number;
  maxContentLength: number;
  requestTimeoutMs: number;
}

/**
 * Everything a handler may touch while running one call.
 */
export interface ToolContext {
  /** The turn this call belongs to; mutations through it are dropped once it goes stale */
  turn: TurnHandle;
  search: SearchProvider;
  fetcher: PageFetcher;
  limits: ToolLimits;
  signal?: AbortSignal;
  /** Run a collaborator call under the request timeout and the turn's signal */
  bounded<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T>;
}

/**
 * One named parameter, as listed for humans.
 */
export interface ToolParameter {
  name: string;
  type: string;
  required: boolean;
  description?: string;
}

export interface CreateToolOptions<TName extends ToolName, TSchema extends z.ZodType> {
  name: TName;
  /** Description shown to the model */
  description: string;
  input: TSchema;
  handler: (input: z.output<TSchema>, ctx: ToolContext) => ToolPayload | Promise<ToolPayload>;
}

export interface ResearchTool<TName extends ToolName = ToolName> {
  readonly name: TName;
  readonly description: string;
  /** JSON Schema for the arguments, sent to the model */
  readonly parameters: Record<string, unknown>;
  readonly parameterList: readonly ToolParameter[];
  run(args: unknown, ctx: ToolContext): Promise<ToolPayload>;
  toSpec(): ToolSpec;
}

// ============================================================================
// Schema helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(property: Record<string, unknown>): string {
  const type = property["type"];
  if (type === "array" && isRecord(property["items"])) {
    return `array<${describeType(property["items"])}>`;
  }
  if (typeof type === "string") return type;
  if (Array.isArray(type)) return type.filter((t) => typeof t === "string").join(" | ");
  return "any";
}

/**
 * Convert a zod object schema to a JSON Schema object without `$schema`.
 */
export function toParameterSchema(schema: z.ZodType): Record<string, unknown> {
  const json: unknown = z.toJSONSchema(schema);
  if (!isRecord(json)) {
    return { type: "object", properties: {} };
  }
  const { $schema: _meta, ...rest } = json;
  return rest;
}

export function listParameters(parameters: Record<string, unknown>): ToolParameter[] {
  const properties = isRecord(parameters["properties"]) ? parameters["properties"] : {};
  const requiredValue = parameters["required"];
  const required = new Set(
    Array.isArray(requiredValue) ? requiredValue.filter((r) => typeof r === "string") : [],
  );

  return Object.entries(properties).map(([name, property]) => {
    const prop = isRecord(property) ? property : {};
    const description = prop["description"];
    return {
      name,
      type: describeType(prop),
      required: required.has(name),
      ...(typeof description === "string" ? { description } : {}),
    };
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

// ============================================================================
// defineTool
// ============================================================================

export function defineTool<TName extends ToolName, TSchema extends z.ZodType>(
  options: CreateToolOptions<TName, TSchema>,
): ResearchTool<TName> {
  const parameters = toParameterSchema(options.input);
  const parameterList = listParameters(parameters);

  return {
    name: options.name,
    description: options.description,
    parameters,
    parameterList,

    async run(args: unknown, ctx: ToolContext): Promise<ToolPayload> {
      const parsed = options.input.safeParse(args);
      if (!parsed.success) {
        throw new ToolError(
          `Invalid arguments for ${options.name}: ${formatIssues(parsed.error)}`,
          "INVALID_ARGUMENTS",
          { cause: parsed.error },
        );
      }
      return await options.handler(parsed.data, ctx);
    },

    toSpec(): ToolSpec {
      return { name: options.name, description: options.description, parameters };
    },
  };
}
