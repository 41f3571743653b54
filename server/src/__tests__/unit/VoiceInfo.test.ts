/**
 * Voice info route payload Unit Tests
 */

import { buildVoiceChatInfo } from "../../api/voiceInfo.js";
import type { ServerConfig } from "../../config/index.js";
import { DEFAULT_VOICE_CHAT_CONFIG, TTS_VOICES } from "../../config/voiceChat.js";

const config: ServerConfig = {
  port: 8000,
  nodeEnv: "test",
  websocketPath: "/api/v1/voice/ws",
  maxPayloadBytes: 8 * 1024 * 1024,
  allowedOrigins: [],
  openai: {
    apiKey: "test-key",
    transcriptionModel: "whisper-1",
    chatModel: "gpt-4o-mini",
    ttsModel: "tts-1",
  },
  voiceChat: { ...DEFAULT_VOICE_CHAT_CONFIG, voice: "sage" },
};

describe("buildVoiceChatInfo", () => {
  it("reports the configured models and voice", () => {
    const info = buildVoiceChatInfo(config);

    expect(info.models).toEqual({
      transcription: "whisper-1",
      response: "gpt-4o-mini",
      speech: "tts-1",
    });
    expect(info.voice).toBe("sage");
  });

  it("lists every supported voice with a description", () => {
    const info = buildVoiceChatInfo(config);

    expect(info.voices.map((voice) => voice.name)).toEqual([...TTS_VOICES]);
    expect(info.voices.every((voice) => voice.description.length > 0)).toBe(true);
  });

  it("describes the audio formats and limits", () => {
    const { audio } = buildVoiceChatInfo(config);

    expect(audio.inputFormats).toContain("pcm");
    expect(audio.defaultInputFormat).toBe("wav");
    expect(audio.recommendedInputSampleRate).toBe(16000);
    expect(audio.outputSampleRate).toBe(24000);
    expect(audio.maxTurnBytes).toBe(25 * 1024 * 1024);
  });

  it("describes the WebSocket protocol", () => {
    const { websocket, implementationGuide } = buildVoiceChatInfo(config);

    expect(websocket).toEqual({
      path: "/api/v1/voice/ws",
      clientMessages: ["start_session", "audio_chunk", "audio_end", "end_session"],
      serverMessages: [
        "session_started",
        "transcription",
        "response_text",
        "audio_stream_start",
        "audio_stream_chunk",
        "audio_stream_end",
        "session_ended",
        "error",
      ],
    });
    expect(implementationGuide[0]).toBe("Connect a WebSocket to /api/v1/voice/ws");
  });

  it("never exposes the API key", () => {
    expect(JSON.stringify(buildVoiceChatInfo(config))).not.toContain("test-key");
  });
});
