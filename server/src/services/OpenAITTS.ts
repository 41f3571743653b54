/**
 * OpenAI TTS Service
 *
 * Streams speech audio from OpenAI's TTS API as it is produced.
 * Output is PCM16 audio at 24kHz, mono.
 */

import OpenAI from "openai";
import { TTSVoice } from "../config/voiceChat.js";
import {
  SpeechSynthesizer,
  UpstreamCallOptions,
} from "../providers/ProviderAdapter.js";

export interface TTSConfig {
  apiKey: string;
  model: string;
  voice: TTSVoice;
  speed: number;
}

const DEFAULT_CONFIG: Omit<TTSConfig, "apiKey"> = {
  model: "tts-1",
  voice: "alloy",
  speed: 1.0,
};

export class OpenAITTS implements SpeechSynthesizer {
  private client: OpenAI;
  private config: TTSConfig;

  constructor(ttsConfig: Partial<TTSConfig> & { apiKey: string }) {
    this.config = { ...DEFAULT_CONFIG, ...ttsConfig };
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
    });
  }

  /**
   * Generate speech for text, yielding audio bytes as the response body
   * arrives. Nothing is buffered beyond the current network read.
   */
  async *synthesize(
    text: string,
    options: UpstreamCallOptions = {},
  ): AsyncGenerator<Buffer> {
    console.log(`[TTS] Generating speech for: "${text.slice(0, 100)}"`);

    const response = await this.client.audio.speech
      .create(
        {
          model: this.config.model,
          voice: this.config.voice,
          input: text,
          response_format: "pcm",
          speed: this.config.speed,
        },
        { signal: options.signal },
      )
      .catch((error: unknown) => {
        console.error(`[TTS] Failed to generate speech:`, error);
        throw error;
      });

    if (!response.body) {
      throw new Error("TTS response has no audio body");
    }

    const reader = response.body.getReader();
    let totalBytes = 0;
    let finished = false;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        if (value.length > 0) {
          totalBytes += value.length;
          yield Buffer.from(value);
        }
      }
    } finally {
      if (!finished) {
        // Consumer stopped early or the read failed; drop the rest of the body
        await reader.cancel().catch((error: unknown) => {
          console.warn(`[TTS] Failed to cancel audio stream:`, error);
        });
      }
      reader.releaseLock();
    }

    console.log(
      `[TTS] Streamed ${totalBytes} bytes (${(totalBytes / 48000).toFixed(2)}s)`,
    );
  }
}
