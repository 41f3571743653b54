/**
 * OpenAI speech-to-text service (Whisper)
 */

import OpenAI, { toFile } from "openai";
import {
  AudioPayload,
  SpeechToText,
  UpstreamCallOptions,
} from "../providers/ProviderAdapter.js";
import { mimeTypeFor, pcmToWav } from "./audio.js";

export interface TranscriberConfig {
  apiKey: string;
  model: string;
  /** Sample rate of raw "pcm" uploads */
  inputSampleRate: number;
}

export class OpenAITranscriber implements SpeechToText {
  private client: OpenAI;
  private config: TranscriberConfig;

  constructor(config: TranscriberConfig) {
    this.config = config;
    this.client = new OpenAI({ apiKey: config.apiKey });
  }

  async transcribe(
    audio: AudioPayload,
    options: UpstreamCallOptions = {},
  ): Promise<string> {
    // Whisper needs a container; raw PCM gets a WAV header
    const isRawPcm = audio.format === "pcm";
    const upload = isRawPcm
      ? pcmToWav(audio.data, this.config.inputSampleRate)
      : audio.data;
    const extension = isRawPcm ? "wav" : audio.format;

    try {
      const file = await toFile(upload, `audio.${extension}`, {
        type: mimeTypeFor(audio.format),
      });

      const transcription = await this.client.audio.transcriptions.create(
        {
          model: this.config.model,
          file,
        },
        { signal: options.signal },
      );

      const text = transcription.text.trim();
      console.log(`[STT] Transcribed audio: ${text.slice(0, 100)}...`);
      return text;
    } catch (error) {
      console.error(`[STT] Error transcribing audio:`, error);
      throw error;
    }
  }
}
