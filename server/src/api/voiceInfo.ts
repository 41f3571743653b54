/**
 * Static description of the voice chat feature, served on
 * GET /api/v1/voice/info
 */

import type { ServerConfig } from "../config/index.js";
import { TTSVoice, TTS_VOICES } from "../config/voiceChat.js";
import {
  CLIENT_MESSAGE_TYPES,
  ClientMessageType,
  SERVER_MESSAGE_TYPES,
  ServerMessageType,
} from "../schemas/messages.js";

const VOICE_DESCRIPTIONS: Record<TTSVoice, string> = {
  alloy: "Neutral and balanced",
  ash: "Male, authoritative",
  coral: "Female, upbeat and energetic",
  echo: "Male, clear and articulate",
  fable: "Expressive storyteller",
  onyx: "Male, deep",
  nova: "Female, bright",
  sage: "Male, wise and thoughtful",
  shimmer: "Female, warm and expressive",
};

export interface VoiceChatInfo {
  feature: string;
  models: {
    transcription: string;
    response: string;
    speech: string;
  };
  voice: TTSVoice;
  voices: { name: TTSVoice; description: string }[];
  audio: {
    inputFormats: string[];
    defaultInputFormat: string;
    recommendedInputSampleRate: number;
    outputFormat: string;
    outputSampleRate: number;
    maxTurnBytes: number;
  };
  websocket: {
    path: string;
    clientMessages: ClientMessageType[];
    serverMessages: ServerMessageType[];
  };
  implementationGuide: string[];
}

export function buildVoiceChatInfo(config: ServerConfig): VoiceChatInfo {
  const { voiceChat } = config;

  return {
    feature: "Voice chat (speech-to-text, chat completion, text-to-speech)",
    models: {
      transcription: config.openai.transcriptionModel,
      response: config.openai.chatModel,
      speech: config.openai.ttsModel,
    },
    voice: voiceChat.voice,
    voices: TTS_VOICES.map((name) => ({
      name,
      description: VOICE_DESCRIPTIONS[name],
    })),
    audio: {
      inputFormats: [...voiceChat.inputFormats],
      defaultInputFormat: "wav",
      recommendedInputSampleRate: voiceChat.inputSampleRate,
      outputFormat: "pcm16",
      outputSampleRate: 24000,
      maxTurnBytes: voiceChat.maxAudioBytes,
    },
    websocket: {
      path: config.websocketPath,
      clientMessages: [...CLIENT_MESSAGE_TYPES],
      serverMessages: [...SERVER_MESSAGE_TYPES],
    },
    implementationGuide: [
      `Connect a WebSocket to ${config.websocketPath}`,
      "Send start_session with a session_id of your choice",
      "Stream the utterance as base64 audio_chunk messages",
      "Send audio_end, then read transcription and response_text",
      "Play audio_stream_chunk payloads until audio_stream_end",
      "Send end_session when done; the server closes the connection",
    ],
  };
}
