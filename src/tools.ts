import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ProgressToken
} from "@modelcontextprotocol/sdk/types.js";
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import path from "path";
import z from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  ToolName,
  ToolTranslateVideoInput,
  ToolTranslateVideoInputSchema,
  ToolListLanguagesInputSchema,
  ToolGetTranslationInputSchema,
  ToolTranslateVideoOutput,
  ToolListLanguagesOutput,
  ToolGetTranslationOutput,
  TranslationOutput
} from "./types/tools.js";
import { LANGUAGE_CODES, distinctLanguages, languageName } from "./types/languages.js";
import type { UploadedVideo } from "./types/media.js";
import type { PipelineState, TranslationOutcome } from "./types/pipeline.js";
import { PipelineFailedError, handleError } from "./types/errors.js";
import {
  decodeUploadedVideo,
  fileUri,
  readRunManifest,
  readRunText,
  readUploadedVideo,
  translationFileName,
  writeRunOutputs
} from "./io.js";
import { fileHash, fileStem, runIdFor } from "./util.js";
import type { VideoTranslationPipeline } from "./pipeline.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";

export interface ToolContext {
  config: AppConfig;
  pipeline: VideoTranslationPipeline;
}

interface CallContext {
  progressToken?: ProgressToken;
  signal: AbortSignal;
}

const logger = createLogger('tools');

const ToolInputJsonSchema = z.object({
  type: z.literal("object"),
  properties: z.record(z.unknown()).optional(),
  required: z.array(z.string()).optional(),
}).passthrough();

function toolInputSchema(schema: z.ZodTypeAny) {
  const jsonSchema: unknown = zodToJsonSchema(schema);
  return ToolInputJsonSchema.parse(jsonSchema);
}

// extracting, transcribing, one step per language, then done
function progressFor(state: PipelineState, total: number): { progress: number; message: string } | undefined {
  switch (state.stage) {
    case 'extracting':
      return { progress: 0, message: "Extracting audio..." };
    case 'transcribing':
      return { progress: 1, message: "Transcribing audio..." };
    case 'translating':
      return { progress: 2 + state.completed, message: `Translating (${state.completed}/${state.total})...` };
    case 'done':
      return { progress: total, message: "Saving translation files..." };
    default:
      return undefined;
  }
}

async function loadVideo(input: ToolTranslateVideoInput): Promise<UploadedVideo> {
  if (input.path !== undefined) {
    return readUploadedVideo(input.path);
  }
  if (input.content_base64 !== undefined && input.filename !== undefined) {
    return decodeUploadedVideo(input.filename, input.content_base64);
  }
  throw new Error("Provide exactly one of path or content_base64");
}

function translationOutput(outcome: TranslationOutcome, folder: string, stem: string): TranslationOutput {
  if (outcome.status === 'failed') {
    return {
      language: outcome.language,
      language_name: languageName(outcome.language),
      status: 'failed',
      error: { code: outcome.error.code, message: outcome.error.message },
    };
  }
  return {
    language: outcome.language,
    language_name: languageName(outcome.language),
    status: 'fulfilled',
    text: outcome.text,
    resource_uri: fileUri(path.join(folder, translationFileName(stem, outcome.language))),
  };
}

function summarize(video: UploadedVideo, output: ToolTranslateVideoOutput): string {
  const succeeded = output.translations.filter(translation => translation.status === 'fulfilled');
  const lines = [
    `Translated "${video.filename}" into ${succeeded.length} of ${output.translations.length} languages in ${(output.elapsed_ms / 1000).toFixed(1)}s.`,
  ];
  for (const translation of output.translations) {
    if (translation.status === 'failed') {
      lines.push(`${translation.language_name} failed: ${translation.error.message}`);
    }
  }
  lines.push(`Files saved to ${output.output_folder} (run ID: "${output.run_id}").`);
  return lines.join('\n');
}

async function translateVideo(server: Server, context: ToolContext, args: unknown, call: CallContext) {
  const input = ToolTranslateVideoInputSchema.parse(args);
  const { progressToken, signal } = call;

  const video = await loadVideo(input);
  const runId = runIdFor(video);
  logger.info(`Received ${video.filename}`, { runId, hash: fileHash(video.data), bytes: video.data.byteLength });
  const total = distinctLanguages(input.languages).length + 3;

  const outcome = await context.pipeline.run(video, input.languages, {
    runId,
    format: input.audio_format,
    signal,
    onTransition: async ({ to }) => {
      const step = progressFor(to, total);
      if (progressToken === undefined || step === undefined) return;
      await server.notification({
        method: "notifications/progress",
        params: { progress: step.progress, total, progressToken, message: step.message },
      });
    },
  });

  if (outcome.status === 'failed') {
    throw new PipelineFailedError(outcome.stage, outcome.runId, outcome.error);
  }

  const saved = await writeRunOutputs(context.config.outputFolder, video, outcome);

  try {
    await server.sendResourceListChanged();
  } catch (error) {
    logger.warn('Failed to send resource list changed notification', { error });
  }

  const stem = fileStem(video.filename);
  const output: ToolTranslateVideoOutput = {
    run_id: outcome.runId,
    transcript: outcome.transcript.text,
    transcript_resource_uri: fileUri(path.join(saved.folder, saved.manifest.transcript_file)),
    translations: outcome.translations.map(translation => translationOutput(translation, saved.folder, stem)),
    elapsed_ms: saved.manifest.elapsed_ms,
    output_folder: path.resolve(saved.folder),
  };

  return {
    content: [{ type: 'text' as const, text: summarize(video, output) }],
    structuredContent: output
  };
}

function listLanguages(args: unknown) {
  ToolListLanguagesInputSchema.parse(args ?? {});

  const output: ToolListLanguagesOutput = {
    languages: LANGUAGE_CODES.map(code => ({ code, name: languageName(code) })),
  };

  return {
    content: [{
      type: 'text' as const,
      text: output.languages.map(language => `${language.code}: ${language.name}`).join('\n')
    }],
    structuredContent: output
  };
}

async function getTranslation(context: ToolContext, args: unknown) {
  const { run_id, language } = ToolGetTranslationInputSchema.parse(args);
  const { outputFolder } = context.config;

  const manifest = await readRunManifest(outputFolder, run_id);
  const text = await readRunText(outputFolder, run_id, language);

  const output: ToolGetTranslationOutput = {
    run_id,
    language,
    text,
    source_filename: manifest.source_filename,
  };

  return {
    content: [{ type: 'text' as const, text }],
    structuredContent: output
  };
}

export default function registerTools(server: Server, context: ToolContext) {
  logger.debug('Registering Tools...');

  // List tools handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: ToolName.TRANSLATE_VIDEO,
          description: "Extract the audio of a video, transcribe it and translate the transcript into each requested language, with progress reporting. Results are saved to the output folder",
          inputSchema: toolInputSchema(ToolTranslateVideoInputSchema),
        },
        {
          name: ToolName.LIST_LANGUAGES,
          description: "List the supported target languages",
          inputSchema: toolInputSchema(ToolListLanguagesInputSchema),
        },
        {
          name: ToolName.GET_TRANSLATION,
          description: "Get the saved transcript of a run, or its translation for one language",
          inputSchema: toolInputSchema(ToolGetTranslationInputSchema),
        },
      ],
    };
  });

  // Call tool handler
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name: action, arguments: args } = request.params;

    try {
      switch (action) {
        case ToolName.TRANSLATE_VIDEO:
          return await translateVideo(server, context, args, {
            progressToken: request.params._meta?.progressToken,
            signal: extra.signal,
          });
        case ToolName.LIST_LANGUAGES:
          return listLanguages(args);
        case ToolName.GET_TRANSLATION:
          return await getTranslation(context, args);
      }
    } catch (error) {
      handleError(error);
    }

    throw new Error(`Unknown tool: ${action}`);
  });
}
