/**
 * Voice Pipeline - one audio turn through the upstream capabilities
 *
 * Stages run strictly in order and each result is sent to the client as
 * soon as it exists:
 *   1. transcription   -> user turn appended, `transcription` sent
 *   2. response        -> assistant turn appended, `response_text` sent
 *   3. synthesis_start -> `audio_stream_start` sent
 *   4. synthesis       -> `audio_stream_chunk`* then `audio_stream_end`
 *
 * A failing stage stops the run with one `audio_processing_error`. History
 * committed by earlier stages is kept. Once the run's signal is aborted
 * nothing more is sent, appended or reported on the bus.
 */

import { v4 as uuidv4 } from "uuid";
import { EventBus } from "./EventBus.js";
import { VoiceSession } from "./SessionRegistry.js";
import { VoiceProviders } from "../providers/ProviderAdapter.js";
import { rechunk } from "../services/audio.js";
import { PipelineStage } from "../schemas/events.js";
import { ServerMessage, errorMessage } from "../schemas/messages.js";

export interface PipelineSink {
  /**
   * Resolves once the message has been handed to the transport
   */
  send(message: ServerMessage): Promise<void>;
}

export interface PipelineOptions {
  /** Size of each outgoing audio_stream_chunk, in bytes */
  streamChunkBytes: number;
}

export type PipelineOutcome =
  | { status: "completed"; audioChunks: number }
  | { status: "failed"; stage: PipelineStage; error: string }
  | { status: "aborted"; stage: PipelineStage };

const STAGE_LABELS: Record<PipelineStage, string> = {
  transcription: "Transcription",
  response: "Response generation",
  synthesis_start: "Speech synthesis",
  synthesis: "Speech synthesis",
};

export const NO_AUDIO_ERROR = "No audio received before audio_end";

export function describeOutcome(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case "completed":
      return `completed (${outcome.audioChunks} audio chunks)`;
    case "failed":
      return `failed during ${outcome.stage}: ${outcome.error}`;
    case "aborted":
      return `aborted during ${outcome.stage}`;
  }
}

export class VoicePipeline {
  private readonly providers: VoiceProviders;
  private readonly options: PipelineOptions;
  private readonly bus: EventBus;

  constructor(providers: VoiceProviders, options: PipelineOptions, bus: EventBus) {
    this.providers = providers;
    this.options = options;
    this.bus = bus;
  }

  async run(
    session: VoiceSession,
    sink: PipelineSink,
    signal: AbortSignal,
  ): Promise<PipelineOutcome> {
    const sessionId = session.id;
    const runId = uuidv4();
    const startedAt = Date.now();
    const isLive = () => !signal.aborted && session.state === "active";

    const audio = session.audio.flush();
    if (!audio) {
      await sink.send(
        errorMessage("audio_processing_error", NO_AUDIO_ERROR, sessionId),
      );
      return { status: "failed", stage: "transcription", error: NO_AUDIO_ERROR };
    }

    console.log(
      `[Pipeline] Run ${runId} started for ${sessionId} (${audio.data.length} bytes of ${audio.format})`,
    );

    let stage: PipelineStage = "transcription";
    let stageStartedAt = startedAt;
    let audioChunks = 0;
    let firstAudioMs: number | null = null;

    const finishStage = () => {
      this.emitStage(sessionId, runId, stage, Date.now() - stageStartedAt);
    };
    const beginStage = (next: PipelineStage) => {
      stage = next;
      stageStartedAt = Date.now();
    };

    try {
      // 1. Transcription
      const transcript = await this.providers.transcriber.transcribe(audio, {
        signal,
      });
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      if (transcript.length === 0) {
        throw new Error("No speech detected in audio");
      }
      session.history.append("user", transcript);
      await sink.send({ type: "transcription", session_id: sessionId, text: transcript });
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      finishStage();

      // 2. Response generation
      beginStage("response");
      const reply = await this.providers.responder.generate(
        session.history.getMessages(),
        { signal },
      );
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      if (reply.length === 0) {
        throw new Error("Empty response from text generation");
      }
      session.history.append("assistant", reply);
      await sink.send({ type: "response_text", session_id: sessionId, text: reply });
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      finishStage();

      // 3. Speech synthesis start
      beginStage("synthesis_start");
      await sink.send({ type: "audio_stream_start", session_id: sessionId });
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      finishStage();

      // 4. Speech synthesis streaming, paced by transport writes
      beginStage("synthesis");
      const stream = rechunk(
        this.providers.synthesizer.synthesize(reply, { signal }),
        this.options.streamChunkBytes,
      );
      for await (const chunk of stream) {
        if (!isLive()) return this.abandon(sessionId, runId, stage);
        if (firstAudioMs === null) {
          firstAudioMs = Date.now() - startedAt;
        }
        audioChunks++;
        await sink.send({
          type: "audio_stream_chunk",
          session_id: sessionId,
          audio_data: chunk.toString("base64"),
        });
      }
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      await sink.send({ type: "audio_stream_end", session_id: sessionId });
      if (!isLive()) return this.abandon(sessionId, runId, stage);
      finishStage();
    } catch (error) {
      if (!isLive()) return this.abandon(sessionId, runId, stage);

      const reason = error instanceof Error ? error.message : String(error);
      console.error(
        `[Pipeline] ${stage} failed for session ${sessionId}:`,
        error,
      );
      this.bus.emit({
        event_id: uuidv4(),
        session_id: sessionId,
        t_ms: Date.now(),
        source: "pipeline",
        type: "pipeline.error",
        payload: { run_id: runId, stage, error: reason },
      });

      await sink.send(
        errorMessage(
          "audio_processing_error",
          `${STAGE_LABELS[stage]} failed: ${reason}`,
          sessionId,
        ),
      );
      return { status: "failed", stage, error: reason };
    }

    session.turns += 1;
    const totalMs = Date.now() - startedAt;
    console.log(
      `[Pipeline] Run ${runId} completed in ${totalMs}ms (${audioChunks} audio chunks)`,
    );
    this.bus.emit({
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "pipeline",
      type: "pipeline.complete",
      payload: {
        run_id: runId,
        total_ms: totalMs,
        first_audio_ms: firstAudioMs,
        audio_chunks: audioChunks,
      },
    });

    return { status: "completed", audioChunks };
  }

  private abandon(
    sessionId: string,
    runId: string,
    stage: PipelineStage,
  ): PipelineOutcome {
    console.log(
      `[Pipeline] Run ${runId} abandoned during ${stage}: session ${sessionId} is gone`,
    );
    return { status: "aborted", stage };
  }

  private emitStage(
    sessionId: string,
    runId: string,
    stage: PipelineStage,
    durationMs: number,
  ): void {
    this.bus.emit({
      event_id: uuidv4(),
      session_id: sessionId,
      t_ms: Date.now(),
      source: "pipeline",
      type: "pipeline.stage",
      payload: { run_id: runId, stage, duration_ms: durationMs },
    });
  }
}
