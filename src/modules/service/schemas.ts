import { z } from "zod";
import { LAW_TYPES, SUPPORTED_COUNTRIES } from "../../constants/laws.js";
import { InvalidRequest } from "../errors.js";

const trimmedString = (max: number) => z.string().trim().min(1).max(max);

export const countrySchema = z.enum(SUPPORTED_COUNTRIES);
export const lawTypeSchema = z.enum(LAW_TYPES);

export const ingestRequestSchema = z.object({
  pdf_bytes: z.instanceof(Uint8Array).refine((bytes) => bytes.byteLength > 0, "must not be empty"),
  country: countrySchema,
  law_name: trimmedString(300),
  law_type: lawTypeSchema,
  source_file: trimmedString(500).optional(),
  law_number: trimmedString(50).nullish(),
  law_year: z.number().int().min(1800).max(2100).nullish()
});

export const queryRequestSchema = z.object({
  question: trimmedString(2000),
  country: countrySchema,
  session_id: trimmedString(128).optional(),
  top_k: z.number().int().min(1).max(20).optional(),
  law_types: z.array(lawTypeSchema).min(1).optional()
});

export const createSessionRequestSchema = z
  .object({
    country: countrySchema.optional(),
    session_id: trimmedString(128).optional()
  })
  .default({});

export const sessionIdSchema = trimmedString(128);

// Callers pass plain strings; the schemas narrow them.
export interface IngestRequest {
  pdf_bytes: Uint8Array;
  country: string;
  law_name: string;
  law_type: string;
  source_file?: string;
  law_number?: string | null;
  law_year?: number | null;
}

export interface QueryRequest {
  question: string;
  country: string;
  session_id?: string;
  top_k?: number;
  law_types?: string[];
}

export interface CreateSessionRequest {
  country?: string;
  session_id?: string;
}

/** Parses `value` or throws `InvalidRequest` listing every issue as `path: message`. */
export function parseRequest<Schema extends z.ZodTypeAny>(schema: Schema, value: unknown): z.output<Schema> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidRequest(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    );
  }
  return parsed.data;
}
