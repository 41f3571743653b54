/**
 * Fixed voice chat defaults.
 *
 * These values are chosen server-side only. No client message can change
 * the system prompt or the voice.
 */

export type TTSVoice =
  | "alloy"
  | "ash"
  | "coral"
  | "echo"
  | "fable"
  | "onyx"
  | "nova"
  | "sage"
  | "shimmer";

export const TTS_VOICES: readonly TTSVoice[] = [
  "alloy",
  "ash",
  "coral",
  "echo",
  "fable",
  "onyx",
  "nova",
  "sage",
  "shimmer",
];

export const INPUT_AUDIO_FORMATS = [
  "wav",
  "mp3",
  "webm",
  "ogg",
  "oga",
  "m4a",
  "mp4",
  "mpeg",
  "mpga",
  "flac",
  "pcm",
] as const;

export interface VoiceChatConfig {
  systemPrompt: string;
  voice: TTSVoice;
  speed: number;
  temperature: number;
  maxResponseTokens: number;
  /** Size of each audio_stream_chunk payload (bytes of PCM16) */
  streamChunkBytes: number;
  /** Sample rate assumed for raw "pcm" input */
  inputSampleRate: number;
  /** Upper bound on buffered audio for a single turn */
  maxAudioBytes: number;
  inputFormats: readonly string[];
}

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a voice assistant for gamers, answering while they play.",
  "Keep answers short and spoken-friendly: two or three sentences, no markdown, no lists, no URLs.",
  "Give concrete, actionable help about builds, quests, bosses, items and mechanics.",
  "If you are not sure about a game detail, say so briefly instead of guessing.",
].join(" ");

export const DEFAULT_VOICE_CHAT_CONFIG: VoiceChatConfig = {
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
  voice: "alloy",
  speed: 1.0,
  temperature: 0.7,
  maxResponseTokens: 300,
  // 100ms of 24kHz mono PCM16
  streamChunkBytes: 4800,
  inputSampleRate: 16000,
  // Upload limit of the transcription endpoint
  maxAudioBytes: 25 * 1024 * 1024,
  inputFormats: INPUT_AUDIO_FORMATS,
};

export function isTTSVoice(value: string): value is TTSVoice {
  return TTS_VOICES.some((voice) => voice === value);
}
