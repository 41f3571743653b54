/**
 * Creates silent PCM16 audio for a given duration.
 *
 * @param durationMs - The duration of the audio in milliseconds.
 * @param sampleRate - The sample rate of the audio (default: 16000).
 * @param channels - The number of channels (default: 1).
 */
export function createAudioForDuration(
  durationMs: number,
  sampleRate = 16000,
  channels = 1,
): Buffer {
  const bytesPerSample = 2; // 16-bit audio
  const numSamples = Math.floor((durationMs / 1000) * sampleRate);
  return Buffer.alloc(numSamples * channels * bytesPerSample);
}

/**
 * Base64 payload for an audio_chunk message
 */
export function audioChunkPayload(durationMs: number, sampleRate = 16000): string {
  return createAudioForDuration(durationMs, sampleRate).toString("base64");
}
