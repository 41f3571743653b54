/**
 * Voice Chat Server Entry Point
 */

import express from 'express';
import { createServer } from 'http';
import { config } from './config/index.js';
import { VoiceWebSocketServer } from './api/websocket.js';
import { buildVoiceChatInfo } from './api/voiceInfo.js';
import { eventBus } from './orchestrator/EventBus.js';
import { latencyBudget } from './insurance/LatencyBudget.js';
import { OpenAITranscriber } from './services/OpenAITranscriber.js';
import { OpenAIResponder } from './services/OpenAIResponder.js';
import { OpenAITTS } from './services/OpenAITTS.js';

const app = express();
const server = createServer(app);

// Middleware
app.use(express.json());

// CORS for the configured browser origins
app.use((req, res, next) => {
  const origin = req.headers.origin;
  if (origin && config.allowedOrigins.includes(origin)) {
    res.header('Access-Control-Allow-Origin', origin);
    res.header('Vary', 'Origin');
  }
  res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
  next();
});

const wsServer = new VoiceWebSocketServer(server, {
  path: config.websocketPath,
  maxPayloadBytes: config.maxPayloadBytes,
  voiceChat: config.voiceChat,
  providers: {
    transcriber: new OpenAITranscriber({
      apiKey: config.openai.apiKey,
      model: config.openai.transcriptionModel,
      inputSampleRate: config.voiceChat.inputSampleRate,
    }),
    responder: new OpenAIResponder({
      apiKey: config.openai.apiKey,
      model: config.openai.chatModel,
      temperature: config.voiceChat.temperature,
      maxTokens: config.voiceChat.maxResponseTokens,
    }),
    synthesizer: new OpenAITTS({
      apiKey: config.openai.apiKey,
      model: config.openai.ttsModel,
      voice: config.voiceChat.voice,
      speed: config.voiceChat.speed,
    }),
  },
  bus: eventBus,
});

latencyBudget.attach(eventBus);

// Health check endpoint
app.get('/health', (req, res) => {
  const aggregate = latencyBudget.getAggregateStats();
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    sessions: wsServer.getRegistry().getSessionCount(),
    connections: wsServer.getConnectionCount(),
    latency: {
      firstAudio: aggregate.firstAudio,
      turn: aggregate.turn,
    },
  });
});

// Voice chat feature description
const voiceInfo = buildVoiceChatInfo(config);
app.get('/api/v1/voice/info', (req, res) => {
  res.json(voiceInfo);
});

// Start server
server.listen(config.port, () => {
  console.log(`[Server] Listening on port ${config.port}`);
  console.log(`[Server] Environment: ${config.nodeEnv}`);
  console.log(`[Server] WebSocket: ws://localhost:${config.port}${config.websocketPath}`);
  console.log(`[Server] Health: http://localhost:${config.port}/health`);
  console.log(`[Server] Voice info: http://localhost:${config.port}/api/v1/voice/info\n`);

  console.log('Voice chat:');
  console.log(`  Transcription: ${config.openai.transcriptionModel}`);
  console.log(`  Response: ${config.openai.chatModel}`);
  console.log(`  Speech: ${config.openai.ttsModel} (${config.voiceChat.voice})\n`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`\n[Server] ${signal} received, shutting down gracefully...`);

  latencyBudget.stop();
  wsServer
    .close()
    .catch((error) => {
      console.error('[Server] Error closing WebSocket server:', error);
    })
    .finally(() => {
      server.close(() => {
        console.log('[Server] HTTP server closed');
        process.exit(0);
      });
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
