/**
 * Latency Budget Tracker
 * Collects pipeline stage timings from the event bus and computes stats
 */

import { EventBus, EventHandler } from "../orchestrator/EventBus.js";
import { PipelineStage } from "../schemas/events.js";

export interface LatencyMetrics {
  transcription: number[];
  response: number[];
  synthesis: number[];
  firstAudio: number[]; // audio_end -> first audio_stream_chunk
  turn: number[]; // audio_end -> audio_stream_end
}

export interface LatencyStats {
  p50: number;
  p95: number;
  p99: number;
  mean: number;
  min: number;
  max: number;
  count: number;
}

export type LatencyReport = Record<keyof LatencyMetrics, LatencyStats>;

const METRIC_KEYS: (keyof LatencyMetrics)[] = [
  "transcription",
  "response",
  "synthesis",
  "firstAudio",
  "turn",
];

function emptyMetrics(): LatencyMetrics {
  return {
    transcription: [],
    response: [],
    synthesis: [],
    firstAudio: [],
    turn: [],
  };
}

export class LatencyBudget {
  private metrics: Map<string, LatencyMetrics>;
  private detach: (() => void) | null = null;

  constructor() {
    this.metrics = new Map();
  }

  /**
   * Record a stage duration. synthesis_start is bookkeeping only.
   */
  recordStage(sessionId: string, stage: PipelineStage, durationMs: number): void {
    if (stage === "synthesis_start") return;
    this.getOrCreate(sessionId)[stage].push(durationMs);
  }

  recordFirstAudio(sessionId: string, latencyMs: number): void {
    this.getOrCreate(sessionId).firstAudio.push(latencyMs);
  }

  recordTurn(sessionId: string, latencyMs: number): void {
    this.getOrCreate(sessionId).turn.push(latencyMs);
  }

  /**
   * Subscribe to pipeline events. Each session's stats are logged and
   * dropped when the session ends.
   */
  attach(bus: EventBus): void {
    this.detach?.();

    const onStage: EventHandler<"pipeline.stage"> = (event) => {
      this.recordStage(event.session_id, event.payload.stage, event.payload.duration_ms);
    };
    const onComplete: EventHandler<"pipeline.complete"> = (event) => {
      this.recordTurn(event.session_id, event.payload.total_ms);
      if (event.payload.first_audio_ms !== null) {
        this.recordFirstAudio(event.session_id, event.payload.first_audio_ms);
      }
    };
    const onSessionEnd: EventHandler<"session.end"> = (event) => {
      const stats = this.getSessionStats(event.session_id);
      if (stats && stats.turn.count > 0) {
        console.log(
          `[Latency] Session ${event.session_id}: ${stats.turn.count} turns, ` +
            `first audio p50 ${stats.firstAudio.p50}ms, turn p95 ${stats.turn.p95}ms`,
        );
      }
      this.clearSession(event.session_id);
    };

    bus.on("pipeline.stage", onStage);
    bus.on("pipeline.complete", onComplete);
    bus.on("session.end", onSessionEnd);

    this.detach = () => {
      bus.off("pipeline.stage", onStage);
      bus.off("pipeline.complete", onComplete);
      bus.off("session.end", onSessionEnd);
      this.detach = null;
    };
  }

  /**
   * Stop listening to the bus
   */
  stop(): void {
    this.detach?.();
  }

  /**
   * Compute statistics for a metric array
   */
  private computeStats(values: number[]): LatencyStats {
    if (values.length === 0) {
      return { p50: 0, p95: 0, p99: 0, mean: 0, min: 0, max: 0, count: 0 };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;

    const p50Index = Math.floor(count * 0.5);
    const p95Index = Math.floor(count * 0.95);
    const p99Index = Math.floor(count * 0.99);

    const sum = sorted.reduce((acc, val) => acc + val, 0);
    const mean = sum / count;

    return {
      p50: sorted[p50Index],
      p95: sorted[p95Index],
      p99: sorted[p99Index],
      mean,
      min: sorted[0],
      max: sorted[count - 1],
      count,
    };
  }

  private report(metrics: LatencyMetrics): LatencyReport {
    return {
      transcription: this.computeStats(metrics.transcription),
      response: this.computeStats(metrics.response),
      synthesis: this.computeStats(metrics.synthesis),
      firstAudio: this.computeStats(metrics.firstAudio),
      turn: this.computeStats(metrics.turn),
    };
  }

  /**
   * Get statistics for a session
   */
  getSessionStats(sessionId: string): LatencyReport | null {
    const metrics = this.metrics.get(sessionId);
    if (!metrics) return null;
    return this.report(metrics);
  }

  /**
   * Get aggregate statistics across all sessions
   */
  getAggregateStats(): LatencyReport {
    const all = emptyMetrics();
    for (const metrics of this.metrics.values()) {
      for (const key of METRIC_KEYS) {
        all[key].push(...metrics[key]);
      }
    }
    return this.report(all);
  }

  /**
   * Clear metrics for a session
   */
  clearSession(sessionId: string): void {
    this.metrics.delete(sessionId);
  }

  private getOrCreate(sessionId: string): LatencyMetrics {
    let metrics = this.metrics.get(sessionId);
    if (!metrics) {
      metrics = emptyMetrics();
      this.metrics.set(sessionId, metrics);
    }
    return metrics;
  }
}

// Singleton instance
export const latencyBudget = new LatencyBudget();
