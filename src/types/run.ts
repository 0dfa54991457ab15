import z from "zod";
import { LANGUAGE_CODES } from "./languages.js";

// Data structure schemas for a saved run (run.json)

export const SavedTranslationSchema = z.discriminatedUnion("status", [
  z.object({
    language: z.enum(LANGUAGE_CODES).describe("Target language code"),
    status: z.literal("fulfilled"),
    file: z.string().describe("Translation file name inside the run folder"),
  }),
  z.object({
    language: z.enum(LANGUAGE_CODES).describe("Target language code"),
    status: z.literal("failed"),
    error: z.object({
      code: z.string(),
      message: z.string(),
    }),
  }),
]);

export const RunManifestSchema = z.object({
  run_id: z.string().describe("Sanitized file stem plus content hash"),
  source_filename: z.string().describe("Name of the uploaded video"),
  source_hash: z.string().describe("MD5 of the uploaded video bytes"),
  created_at: z.string().describe("ISO datetime when the run finished"),
  elapsed_ms: z.number().int().nonnegative().describe("Total processing time"),
  transcript_file: z.string().describe("Transcript file name inside the run folder"),
  translations: z.array(SavedTranslationSchema).describe("Translations in requested order"),
});

export type SavedTranslation = z.infer<typeof SavedTranslationSchema>;
export interface RunManifest extends z.infer<typeof RunManifestSchema> { }
