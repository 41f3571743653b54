/**
 * Audio helpers shared by the OpenAI services and the pipeline
 */

const MIME_TYPES: Record<string, string> = {
  wav: "audio/wav",
  pcm: "audio/wav", // wrapped in a WAV header before upload
  mp3: "audio/mpeg",
  mpeg: "audio/mpeg",
  mpga: "audio/mpeg",
  m4a: "audio/mp4",
  mp4: "audio/mp4",
  webm: "audio/webm",
  ogg: "audio/ogg",
  oga: "audio/ogg",
  flac: "audio/flac",
};

export function mimeTypeFor(format: string): string {
  return MIME_TYPES[format] ?? "application/octet-stream";
}

/**
 * 44-byte RIFF header for mono 16-bit PCM
 */
export function createWavHeader(dataLength: number, sampleRate: number): Buffer {
  const channels = 1;
  const bitsPerSample = 16;
  const header = Buffer.alloc(44);
  const byteRate = sampleRate * channels * (bitsPerSample / 8);
  const blockAlign = channels * (bitsPerSample / 8);

  header.write("RIFF", 0);
  header.writeUInt32LE(36 + dataLength, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataLength, 40);

  return header;
}

export function pcmToWav(pcm: Buffer, sampleRate: number): Buffer {
  return Buffer.concat([createWavHeader(pcm.length, sampleRate), pcm]);
}

/**
 * Re-slice an audio stream into fixed-size chunks, preserving order.
 * The final chunk carries whatever remains. Pulls from the source only
 * when the consumer asks for the next chunk.
 */
export async function* rechunk(
  source: AsyncIterable<Buffer>,
  chunkBytes: number,
): AsyncGenerator<Buffer> {
  if (chunkBytes <= 0) {
    throw new RangeError(`chunkBytes must be positive, got ${chunkBytes}`);
  }

  let pending: Buffer = Buffer.alloc(0);

  for await (const piece of source) {
    pending = pending.length === 0 ? piece : Buffer.concat([pending, piece]);

    while (pending.length >= chunkBytes) {
      yield pending.subarray(0, chunkBytes);
      pending = pending.subarray(chunkBytes);
    }
  }

  if (pending.length > 0) {
    yield pending;
  }
}
