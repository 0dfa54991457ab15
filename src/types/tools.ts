import z from "zod";
import { LANGUAGE_CODES } from "./languages.js";
import { AUDIO_FORMATS } from "./media.js";

// Enums

export enum ToolName {
  TRANSLATE_VIDEO = "translate_video",
  LIST_LANGUAGES = "list_languages",
  GET_TRANSLATION = "get_translation",
}

// Tool input schemas

export const ToolTranslateVideoInputSchema = z.object({
  path: z.string().min(1).optional().describe("Path of a local video file"),
  content_base64: z.string().min(1).optional().describe("Base64 encoded video bytes, instead of path"),
  filename: z.string().min(1).optional().describe("Original file name; required with content_base64"),
  languages: z.array(z.enum(LANGUAGE_CODES)).min(1).describe("Target language codes, in display order"),
  audio_format: z.enum(AUDIO_FORMATS).default("mp3").describe("Audio encoding sent to speech-to-text"),
})
  .refine(input => (input.path === undefined) !== (input.content_base64 === undefined), {
    message: "Provide exactly one of path or content_base64",
  })
  .refine(input => input.content_base64 === undefined || input.filename !== undefined, {
    message: "filename is required with content_base64",
    path: ["filename"],
  });

export const ToolListLanguagesInputSchema = z.object({});

export const ToolGetTranslationInputSchema = z.object({
  run_id: z.string()
    .regex(/^[^/\\]+$/, "run_id must not contain path separators")
    .refine(value => value !== "." && value !== "..", "run_id must name a run folder")
    .describe("Run ID returned by translate_video"),
  language: z.enum(LANGUAGE_CODES).optional().describe("Language code; omit to get the transcript"),
});

// Tool output schemas

export const TranslationOutputSchema = z.discriminatedUnion("status", [
  z.object({
    language: z.enum(LANGUAGE_CODES),
    language_name: z.string(),
    status: z.literal("fulfilled"),
    text: z.string(),
    resource_uri: z.string(),
  }),
  z.object({
    language: z.enum(LANGUAGE_CODES),
    language_name: z.string(),
    status: z.literal("failed"),
    error: z.object({ code: z.string(), message: z.string() }),
  }),
]);

export const ToolTranslateVideoOutputSchema = z.object({
  run_id: z.string(),
  transcript: z.string(),
  transcript_resource_uri: z.string(),
  translations: z.array(TranslationOutputSchema),
  elapsed_ms: z.number().int(),
  output_folder: z.string(),
});

export const ToolListLanguagesOutputSchema = z.object({
  languages: z.array(z.object({
    code: z.enum(LANGUAGE_CODES),
    name: z.string(),
  })),
});

export const ToolGetTranslationOutputSchema = z.object({
  run_id: z.string(),
  language: z.enum(LANGUAGE_CODES).optional(),
  text: z.string(),
  source_filename: z.string(),
});

// Types

export type ToolTranslateVideoInput = z.infer<typeof ToolTranslateVideoInputSchema>;
export type TranslationOutput = z.infer<typeof TranslationOutputSchema>;
export type ToolTranslateVideoOutput = z.infer<typeof ToolTranslateVideoOutputSchema>;
export type ToolListLanguagesOutput = z.infer<typeof ToolListLanguagesOutputSchema>;
export type ToolGetTranslationOutput = z.infer<typeof ToolGetTranslationOutputSchema>;
