import {
  Resource,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema
} from "@modelcontextprotocol/sdk/types.js";
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import path from "path";
import { fileURLToPath } from "url";
import { fileExists, readFile } from "./fs.js";
import { MANIFEST_FILE, fileUri, listSavedRuns } from "./io.js";
import { languageName } from "./types/languages.js";
import { isInsideFolder } from "./util.js";
import { createLogger } from "./logger.js";

export const PAGE_SIZE = 10;

const TEXT_MIME_TYPE = "text/plain";

const logger = createLogger('resources');

// Every text file of every saved run, transcript first
export async function loadRunResources(outputFolder: string): Promise<Resource[]> {
  const resources: Resource[] = [];

  for (const { folder, manifest } of await listSavedRuns(outputFolder)) {
    resources.push({
      uri: fileUri(path.join(folder, manifest.transcript_file)),
      name: `${manifest.source_filename} - Transcript`,
      description: `Transcript of ${manifest.source_filename} (${manifest.run_id})`,
      mimeType: TEXT_MIME_TYPE,
    });

    for (const translation of manifest.translations) {
      if (translation.status !== 'fulfilled') continue;
      resources.push({
        uri: fileUri(path.join(folder, translation.file)),
        name: `${manifest.source_filename} - ${languageName(translation.language)} translation`,
        description: `${languageName(translation.language)} translation of ${manifest.source_filename} (${manifest.run_id})`,
        mimeType: TEXT_MIME_TYPE,
      });
    }
  }

  return resources;
}

function uriToPath(uri: string): string | undefined {
  if (!uri.startsWith('file://')) return undefined;
  try {
    return fileURLToPath(uri);
  } catch (error) {
    logger.debug(`Invalid file URI: ${uri}`, { error });
    return undefined;
  }
}

// Start index encoded in a list cursor; anything unreadable restarts at the first page
export function decodeCursor(cursor: string | undefined): number {
  if (!cursor) return 0;
  try {
    const index = parseInt(atob(cursor), 10);
    return Number.isInteger(index) && index > 0 ? index : 0;
  } catch (error) {
    logger.debug(`Ignoring invalid cursor: ${cursor}`, { error });
    return 0;
  }
}

// A run file sits directly in a saved run folder, one with a manifest
async function isSavedRunFile(outputFolder: string, filePath: string): Promise<boolean> {
  const folder = path.dirname(filePath);
  if (path.resolve(path.dirname(folder)) !== path.resolve(outputFolder)) return false;
  if (path.basename(folder).startsWith('.') || path.extname(filePath) !== '.txt') return false;
  return await fileExists(path.join(folder, MANIFEST_FILE)) && await fileExists(filePath);
}

export default function registerResources(server: Server, outputFolder: string) {
  logger.debug('Registering Resources...');

  // List resources handler
  server.setRequestHandler(ListResourcesRequestSchema, async (request) => {
    const runResources = await loadRunResources(outputFolder);

    const startIndex = decodeCursor(request.params?.cursor);
    const endIndex = Math.min(startIndex + PAGE_SIZE, runResources.length);
    const resources = runResources.slice(startIndex, endIndex);

    let nextCursor: string | undefined;
    if (endIndex < runResources.length) {
      nextCursor = btoa(endIndex.toString());
    }

    return {
      resources,
      nextCursor,
    };
  });

  // List resource templates handler
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return {
      resourceTemplates: [
        {
          uriTemplate: `${fileUri(outputFolder)}/{run_id}/{file}`,
          name: "Video Translation Output",
          description: "Plain-text transcript or translation saved by a translate_video run",
          mimeType: TEXT_MIME_TYPE,
        },
      ],
    };
  });

  // Read resource handler
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const filePath = uriToPath(uri);

    // Only text files of saved runs inside the output folder are served
    if (!filePath || !isInsideFolder(outputFolder, filePath) || !(await isSavedRunFile(outputFolder, filePath))) {
      throw new Error(`Resource not found: ${uri}`);
    }

    try {
      return {
        contents: [
          {
            uri,
            mimeType: TEXT_MIME_TYPE,
            text: await readFile(filePath),
          },
        ],
      };
    } catch (error) {
      throw new Error(`Failed to read resource: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  });
}
