/**
 * Upstream provider contracts
 * The pipeline depends on speech-to-text, text generation and speech
 * synthesis only through these interfaces.
 */

import { ChatMessage } from "../storage/ConversationHistory.js";

export interface AudioPayload {
  data: Buffer;
  format: string;
}

export interface UpstreamCallOptions {
  /** Aborted when the owning connection closes */
  signal?: AbortSignal;
}

export interface SpeechToText {
  transcribe(audio: AudioPayload, options?: UpstreamCallOptions): Promise<string>;
}

export interface TextGenerator {
  generate(
    history: readonly ChatMessage[],
    options?: UpstreamCallOptions,
  ): Promise<string>;
}

export interface SpeechSynthesizer {
  /**
   * Lazily yields audio as the provider produces it.
   * Output is 24kHz mono PCM16.
   */
  synthesize(text: string, options?: UpstreamCallOptions): AsyncIterable<Buffer>;
}

export interface VoiceProviders {
  transcriber: SpeechToText;
  responder: TextGenerator;
  synthesizer: SpeechSynthesizer;
}
