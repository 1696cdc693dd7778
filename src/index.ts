// Sales Call Scorecard - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { LocalAudioStorage } from "./audio-storage.js";
import { OpenAIChecklistAnalyzer } from "./checklist-analyzer.js";
import { TaxonomyProvider, loadTaxonomy } from "./checklist-taxonomy.js";
import { OpenAICoachingGenerator } from "./coaching-generator.js";
import type { AppConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { FilePersistence } from "./file-persistence.js";
import { createLogger } from "./logger.js";
import type { OpenAIClient } from "./openai-client.js";
import { PipelineCoordinator } from "./pipeline-coordinator.js";
import { MarkdownReportGenerator } from "./report-generator.js";
import { createRetryPolicy } from "./retry-policy.js";
import { createAppServer } from "./server.js";
import { SessionStateMachine } from "./session-state-machine.js";
import { InMemorySessionStore } from "./session-store.js";
import { StageTaskQueue } from "./stage-task-queue.js";
import type { DeepgramPrerecordedClient, OpenAITranscriptionClient, Transcriber } from "./transcription-engine.js";
import { DeepgramTranscriber, OpenAITranscriber } from "./transcription-engine.js";
import type { OpenAITTSClient } from "./tts-engine.js";
import { TTSEngine } from "./tts-engine.js";

export const APP_NAME = "Sales Call Scorecard";
export const APP_VERSION = "0.1.0";

const log = createLogger("Init");

function createTranscriber(config: AppConfig, openaiClient: OpenAI): Transcriber {
  if (config.transcriptionProvider === "deepgram") {
    if (!config.deepgramApiKey) {
      throw new Error("TRANSCRIPTION_PROVIDER is deepgram but DEEPGRAM_API_KEY is not set");
    }
    const deepgram = createDeepgramClient(config.deepgramApiKey);
    const prerecorded: DeepgramPrerecordedClient = {
      async transcribeFile(source, options) {
        const { result, error } = await deepgram.listen.prerecorded.transcribeFile(source, options);
        if (error) throw error;
        return result;
      },
    };
    log.info("Transcription: Deepgram prerecorded");
    return new DeepgramTranscriber(prerecorded);
  }
  log.info(`Transcription: OpenAI ${config.transcriptionModel}`);
  return new OpenAITranscriber(openaiClient as unknown as OpenAITranscriptionClient, config.transcriptionModel);
}

async function main(): Promise<void> {
  const config = loadConfig();

  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is not set. Add it to your .env file.");
  }

  // ─── Taxonomy and persistence ───────────────────────────────────────────────

  const taxonomy = new TaxonomyProvider(await loadTaxonomy(config.taxonomyPath));
  const current = taxonomy.current();
  log.info(
    `Checklist ${current.version}: ${current.activeItems().length} items in ${current.activeCategories().length} categories`,
  );

  const store = new InMemorySessionStore();
  const stateMachine = new SessionStateMachine({ store, taxonomy, leaseTtlMs: config.leaseTtlMs });

  // ─── External collaborators ─────────────────────────────────────────────────

  const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
  const chatClient = openaiClient as unknown as OpenAIClient;
  const filePersistence = new FilePersistence(config.outputDir);
  const audioStorage = new LocalAudioStorage(config.audioDir);

  const coordinator = new PipelineCoordinator({
    stateMachine,
    store,
    taxonomy,
    audioStorage,
    transcriber: createTranscriber(config, openaiClient),
    analyzer: new OpenAIChecklistAnalyzer(chatClient, config.analysisModel),
    coachingGenerator: new OpenAICoachingGenerator(chatClient, config.coachingModel),
    ttsEngine: config.coachingAudioEnabled
      ? new TTSEngine(openaiClient as unknown as OpenAITTSClient, config.ttsModel)
      : undefined,
    ttsConfig: { voice: config.ttsVoice },
    reportGenerator: new MarkdownReportGenerator(),
    filePersistence,
    retryPolicy: createRetryPolicy(config.retry),
    timeouts: config.timeouts,
    scoreOptions: { ranking: { limit: config.rankingLimit } },
  });

  const queue = new StageTaskQueue(coordinator, { concurrency: config.workerConcurrency });

  // ─── Start server ───────────────────────────────────────────────────────────

  const server = createAppServer({
    stateMachine,
    coordinator,
    taxonomy,
    queue,
  });

  await server.listen(config.port);
  log.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  log.info("Pipeline: upload → transcription → checklist analysis → scoring → coaching/report");

  const shutdown = (signal: string) => {
    log.info(`${signal} received, draining stage queue`);
    queue
      .drain()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
