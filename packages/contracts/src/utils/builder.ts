import type { z } from "zod";
import { DEFAULT_GENERATION_PROFILE } from "../defaults";
import { type MapSkeleton, MapSkeletonSchema } from "../schemas/map-skeleton";
import {
  type GenerationProfile,
  type GenerationProfileInput,
  GenerationProfileSchema,
} from "../schemas/profile";
import { GenerationError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export interface ConfigIssue {
  readonly parameter: string;
  readonly message: string;
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    parameter: issue.path.map(String).join(".") || "(root)",
    message: issue.message,
  }));
}

function toConfigError(subject: string, error: z.ZodError): GenerationError {
  const issues = toIssues(error);
  const first = issues[0];
  const summary = first
    ? `${first.parameter}: ${first.message}`
    : "validation failed";
  return GenerationError.configInvalid(`Invalid ${subject} (${summary})`, {
    parameter: first?.parameter,
    issues,
  });
}

export function parseGenerationProfile(
  input: unknown,
): Result<GenerationProfile, GenerationError> {
  const parsed = GenerationProfileSchema.safeParse(input);
  if (!parsed.success) return Err(toConfigError("generation profile", parsed.error));
  return Ok(parsed.data);
}

/**
 * Default profile with `overrides` applied on top, validated as a whole.
 */
export function buildGenerationProfile(
  overrides: Partial<GenerationProfileInput> = {},
): Result<GenerationProfile, GenerationError> {
  return parseGenerationProfile({ ...DEFAULT_GENERATION_PROFILE, ...overrides });
}

export function parseMapSkeleton(
  input: unknown,
): Result<MapSkeleton, GenerationError> {
  const parsed = MapSkeletonSchema.safeParse(input);
  if (!parsed.success) return Err(toConfigError("map skeleton", parsed.error));
  return Ok(parsed.data);
}
