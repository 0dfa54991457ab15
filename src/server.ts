import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import registerTools, { ToolContext } from './tools.js';
import registerResources from './resources.js';
import type { AppConfig } from './config.js';
import { FfmpegExtractor } from './ffmpeg.js';
import { VideoTranslationPipeline } from './pipeline.js';
import { createOpenAIClient } from './provider.js';
import { OpenAITranscriber } from './transcriber.js';
import { OpenAITranslator } from './translator.js';

export function createPipeline(config: AppConfig): VideoTranslationPipeline {
  const client = createOpenAIClient(config);

  return new VideoTranslationPipeline({
    extractor: new FfmpegExtractor({
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
      tempFolder: config.tempFolder,
      timeoutMs: config.ffmpegTimeoutMs,
    }),
    transcriber: new OpenAITranscriber(client, config.transcriptionModel),
    translator: new OpenAITranslator(client, config.translationModel),
  });
}

export function createServer(context: ToolContext): Server {
  const server = new Server({
    name: 'video-translate',
    version: '1.0.0',
    title: 'Video Translation MCP Server',
  },
    {
      capabilities: {
        resources: { listChanged: true },
        tools: {},
      },
    }
  );

  registerResources(server, context.config.outputFolder);
  registerTools(server, context);

  return server;
}
