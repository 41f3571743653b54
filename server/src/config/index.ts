/**
 * Configuration loader for the voice chat server
 */

import { config as loadEnv } from "dotenv";
import { resolve } from "path";
import { existsSync } from "fs";
import {
  DEFAULT_VOICE_CHAT_CONFIG,
  isTTSVoice,
  TTSVoice,
  VoiceChatConfig,
} from "./voiceChat.js";

// When running from server/, the .env usually lives one level up
const currentDir = process.cwd();
const parentDir = resolve(currentDir, "..");

const envPaths = [resolve(parentDir, ".env"), resolve(currentDir, ".env")];

let envLoaded = false;
for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      console.log(`[Config] Loaded environment variables from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.warn("[Config] No .env file found in expected locations:");
  envPaths.forEach((p) => console.warn(`  - ${p}`));
  console.warn("[Config] Continuing with environment variables from shell/system...");
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  websocketPath: string;
  maxPayloadBytes: number;
  allowedOrigins: string[];
  openai: {
    apiKey: string;
    transcriptionModel: string;
    chatModel: string;
    ttsModel: string;
  };
  voiceChat: VoiceChatConfig;
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value) return value;
  if (defaultValue === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new Error(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getEnvVoice(key: string, defaultValue: TTSVoice): TTSVoice {
  const value = process.env[key];
  if (!value) return defaultValue;

  const normalized = value.trim().toLowerCase();
  if (isTTSVoice(normalized)) {
    return normalized;
  }

  console.warn(
    `[Config] Invalid ${key}="${value}". Using default "${defaultValue}".`,
  );
  return defaultValue;
}

export const config: ServerConfig = {
  port: getEnvNumber("PORT", 8000),
  nodeEnv: getEnvVar("NODE_ENV", "development"),
  websocketPath: getEnvVar("VOICE_WS_PATH", "/api/v1/voice/ws"),
  maxPayloadBytes: getEnvNumber("WS_MAX_PAYLOAD_BYTES", 8 * 1024 * 1024),
  allowedOrigins: getEnvList("ALLOWED_ORIGINS", [
    "http://localhost:3000",
    "http://127.0.0.1:3000",
  ]),
  openai: {
    apiKey: getEnvVar("OPENAI_API_KEY"),
    transcriptionModel: getEnvVar("OPENAI_TRANSCRIPTION_MODEL", "whisper-1"),
    chatModel: getEnvVar("OPENAI_CHAT_MODEL", "gpt-4o-mini"),
    ttsModel: getEnvVar("OPENAI_TTS_MODEL", "tts-1"),
  },
  voiceChat: {
    ...DEFAULT_VOICE_CHAT_CONFIG,
    voice: getEnvVoice("VOICE_CHAT_VOICE", DEFAULT_VOICE_CHAT_CONFIG.voice),
  },
};
