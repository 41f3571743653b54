/**
 * Audio Buffer - accumulates one turn of client audio fragments
 *
 * Fragments are kept in the order they were sent and concatenated on
 * flush. All fragments of a turn must share the declared format.
 */

import { VoiceChatError } from "./VoiceChatError.js";

export interface AudioFragment {
  data: Buffer;
  format: string;
}

export interface AudioBufferOptions {
  maxBytes: number;
  supportedFormats: readonly string[];
}

export class AudioBuffer {
  private fragments: Buffer[] = [];
  private totalBytes = 0;
  private turnFormat: string | null = null;
  private readonly maxBytes: number;
  private readonly supportedFormats: ReadonlySet<string>;

  constructor(options: AudioBufferOptions) {
    this.maxBytes = options.maxBytes;
    this.supportedFormats = new Set(options.supportedFormats);
  }

  /**
   * Append a fragment to the current turn.
   * Throws VoiceChatError("audio_chunk_error") when the fragment is rejected;
   * a rejected fragment leaves the buffer unchanged.
   */
  append(fragment: AudioFragment): void {
    if (!this.supportedFormats.has(fragment.format)) {
      throw new VoiceChatError(
        "audio_chunk_error",
        `Unsupported audio format "${fragment.format}"`,
      );
    }

    if (this.turnFormat !== null && fragment.format !== this.turnFormat) {
      throw new VoiceChatError(
        "audio_chunk_error",
        `Audio format changed mid-turn from "${this.turnFormat}" to "${fragment.format}"`,
      );
    }

    if (fragment.data.length === 0) {
      throw new VoiceChatError("audio_chunk_error", "Audio chunk is empty");
    }

    if (this.totalBytes + fragment.data.length > this.maxBytes) {
      throw new VoiceChatError(
        "audio_chunk_error",
        `Audio for this turn exceeds ${this.maxBytes} bytes`,
      );
    }

    this.fragments.push(fragment.data);
    this.totalBytes += fragment.data.length;
    this.turnFormat = fragment.format;
  }

  /**
   * Concatenate and clear the buffered turn.
   * Returns null when nothing was buffered.
   */
  flush(): AudioFragment | null {
    if (this.fragments.length === 0 || this.turnFormat === null) {
      return null;
    }

    const payload: AudioFragment = {
      data: Buffer.concat(this.fragments, this.totalBytes),
      format: this.turnFormat,
    };
    this.clear();
    return payload;
  }

  clear(): void {
    this.fragments = [];
    this.totalBytes = 0;
    this.turnFormat = null;
  }

  get byteLength(): number {
    return this.totalBytes;
  }
}
