/**
 * Internal event schema for the voice chat orchestrator
 */

export type EventSource = "client" | "orchestrator" | "pipeline";

export interface BaseEvent {
  event_id: string;
  session_id: string;
  t_ms: number;
  source: EventSource;
  type: string;
  payload: unknown;
}

// Session Events
export type SessionEndReason =
  | "user_ended"
  | "connection_closed"
  | "server_shutdown";

export interface SessionStartEvent extends BaseEvent {
  type: "session.start";
  source: "orchestrator";
  payload: Record<string, never>;
}

export interface SessionEndPayload {
  reason: SessionEndReason;
  duration_ms: number;
  turns: number;
}

export interface SessionEndEvent extends BaseEvent {
  type: "session.end";
  source: "orchestrator";
  payload: SessionEndPayload;
}

export interface SessionErrorEvent extends BaseEvent {
  type: "session.error";
  source: "orchestrator";
  payload: { error: string };
}

// Pipeline Events
export type PipelineStage =
  | "transcription"
  | "response"
  | "synthesis_start"
  | "synthesis";

export interface PipelineStagePayload {
  run_id: string;
  stage: PipelineStage;
  duration_ms: number;
}

export interface PipelineStageEvent extends BaseEvent {
  type: "pipeline.stage";
  source: "pipeline";
  payload: PipelineStagePayload;
}

export interface PipelineErrorPayload {
  run_id: string;
  stage: PipelineStage;
  error: string;
}

export interface PipelineErrorEvent extends BaseEvent {
  type: "pipeline.error";
  source: "pipeline";
  payload: PipelineErrorPayload;
}

export interface PipelineCompletePayload {
  run_id: string;
  total_ms: number;
  first_audio_ms: number | null;
  audio_chunks: number;
}

export interface PipelineCompleteEvent extends BaseEvent {
  type: "pipeline.complete";
  source: "pipeline";
  payload: PipelineCompletePayload;
}

export type Event =
  | SessionStartEvent
  | SessionEndEvent
  | SessionErrorEvent
  | PipelineStageEvent
  | PipelineErrorEvent
  | PipelineCompleteEvent;

export type EventType = Event["type"];
