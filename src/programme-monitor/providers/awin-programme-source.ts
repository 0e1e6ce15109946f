import { z } from "zod";
import { UpstreamError } from "../domain/errors.js";
import {
  createProgrammeSnapshot,
  normalizeMarketKey,
  normalizeProgrammeId,
  type ProgrammeDetails,
  type ProgrammeId,
  type ProgrammeSnapshot,
} from "../domain/models.js";
import type { ProgrammeSource } from "./programme-source.js";

export type AwinProgrammeSourceOptions = {
  apiBaseUrl: string;
  publisherId: string | null;
  token: string | null;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  now?: () => Date;
};

const programmeIdSchema = z.union([
  z.number().int().nonnegative().safe(),
  z.string().trim().min(1),
]);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const programmeItemSchema = z
  .object({
    advertiserId: programmeIdSchema.nullish(),
    programId: programmeIdSchema.nullish(),
    id: programmeIdSchema.nullish(),
    advertiserName: optionalText,
    programName: optionalText,
    name: optionalText,
    programmeStatus: optionalText,
    status: optionalText,
    relationship: optionalText,
    relationshipStatus: optionalText,
  })
  .passthrough()
  .transform((item, context) => {
    const rawId = item.advertiserId ?? item.programId ?? item.id;
    if (rawId === null || rawId === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Programme entry has none of advertiserId, programId or id.",
      });
      return z.NEVER;
    }
    const details: ProgrammeDetails = {
      name: item.advertiserName ?? item.programName ?? item.name,
      status: item.programmeStatus ?? item.status,
      relationship: item.relationship ?? item.relationshipStatus,
    };
    return { programmeId: normalizeProgrammeId(rawId), details };
  });

export const awinProgrammesResponseSchema = z.union([
  z.array(programmeItemSchema),
  z
    .object({ programmes: z.array(programmeItemSchema) })
    .passthrough()
    .transform((payload) => payload.programmes),
]);

export type DecodedProgramme = { programmeId: ProgrammeId; details: ProgrammeDetails };

/**
 * Decodes an AWIN `/programmes` payload. Any mismatch is a permanent upstream
 * error: retrying the same request would return the same shape.
 */
export const decodeAwinProgrammes = (payload: unknown): DecodedProgramme[] => {
  const parsed = awinProgrammesResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new UpstreamError("permanent", `AWIN programmes response did not match schema: ${summary}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};

export const classifyHttpStatus = (statusCode: number): "transient" | "permanent" => {
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return "transient";
  }
  return "permanent";
};

const normalizeBaseUrl = (value: string): string => {
  const normalized = value.trim().replace(/\/+$/, "");
  if (normalized.length === 0) {
    throw new Error("AWIN apiBaseUrl must be a non-empty string.");
  }
  return normalized;
};

const normalizeTimeoutMs = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error("AWIN timeoutMs must be a positive number.");
  }
  return value;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

export class AwinProgrammeSource implements ProgrammeSource {
  private readonly apiBaseUrl: string;
  private readonly publisherId: string | null;
  private readonly token: string | null;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;

  constructor(options: AwinProgrammeSourceOptions) {
    this.apiBaseUrl = normalizeBaseUrl(options.apiBaseUrl);
    this.publisherId = options.publisherId?.trim() || null;
    this.token = options.token?.trim() || null;
    this.timeoutMs = normalizeTimeoutMs(options.timeoutMs ?? 30_000);
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  buildProgrammesUrl(marketKey: string): string {
    if (!this.publisherId) {
      throw new UpstreamError("permanent", "AWIN publisher id is not configured.");
    }
    const url = new URL(`${this.apiBaseUrl}/publishers/${encodeURIComponent(this.publisherId)}/programmes`);
    url.searchParams.set("countryCode", normalizeMarketKey(marketKey));
    return url.toString();
  }

  async fetchActive(marketKey: string): Promise<ProgrammeSnapshot> {
    const normalizedKey = normalizeMarketKey(marketKey);
    if (!this.token) {
      throw new UpstreamError("permanent", "AWIN API token is not configured.");
    }
    const url = this.buildProgrammesUrl(normalizedKey);

    const payload = await this.requestJson(url, this.token);
    const observedAt = this.now();
    return createProgrammeSnapshot({
      marketKey: normalizedKey,
      observedAt,
      programmes: decodeAwinProgrammes(payload),
    });
  }

  /** The deadline covers the headers and the body read. */
  private async requestJson(url: string, token: string): Promise<unknown> {
    const controller = new AbortController();
    let rejectOnDeadline: (error: UpstreamError) => void = () => undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      rejectOnDeadline = reject;
    });
    const timeoutHandle = setTimeout(() => {
      controller.abort();
      rejectOnDeadline(this.timeoutError());
    }, this.timeoutMs);

    try {
      return await Promise.race([this.readPayload(url, token, controller.signal), deadline]);
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private async readPayload(url: string, token: string, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          accept: "application/json",
          authorization: `Bearer ${token}`,
        },
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw this.timeoutError(error);
      }
      throw new UpstreamError("transient", `AWIN request failed: ${String(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const kind = classifyHttpStatus(response.status);
      throw new UpstreamError(
        kind,
        `AWIN programmes request failed with status ${response.status}${body ? `: ${body.slice(0, 200)}` : ""}`,
        { statusCode: response.status },
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw this.timeoutError(error);
      }
      throw new UpstreamError("transient", `AWIN response body could not be read: ${String(error)}`, {
        statusCode: response.status,
        cause: error,
      });
    }

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new UpstreamError("permanent", "AWIN programmes response is not valid JSON.", {
        statusCode: response.status,
        cause: error,
      });
    }
  }

  private timeoutError(cause?: unknown): UpstreamError {
    return new UpstreamError("transient", `AWIN request timed out after ${this.timeoutMs}ms.`, { cause });
  }
}
