/**
 * Streaming VAD Adapter
 *
 * Drives an online segmenter from a push-based ChunkSource.
 *
 * Implements the push-to-pull reconciliation pattern:
 * - chunks arrive asynchronously and are pushed through the segmenter
 * - nextSegments() returns the segments finalized since the last call
 *
 * Errors the segmenter raises inside a source callback have no caller to
 * reach, so they are recorded as diagnostics and the chunk is skipped.
 */

import type {
  AudioChunk,
  Diagnostic,
  DiagnosticCategory,
  IStreamSegmenter,
  TimedSegment,
  VadError,
} from "@vadpoint/contracts";

import { isVadError } from "@vadpoint/contracts";

import type { ChunkSource } from "./ChunkSource";

export interface StreamingVadAdapterConfig {
  /**
   * Flush the segmenter when the source signals end-of-stream.
   * @default true
   */
  flushOnEnd?: boolean;
}

const DEFAULT_CONFIG: Required<StreamingVadAdapterConfig> = {
  flushOnEnd: true,
};

export class StreamingVadAdapter {
  private config: Required<StreamingVadAdapterConfig>;
  private subscriptions: Array<() => void> = [];

  /** Segments finalized since last nextSegments() call */
  private pendingSegments: TimedSegment[] = [];

  private diagnostics: Diagnostic[] = [];
  private ended = false;

  constructor(
    private source: ChunkSource,
    private segmenter: IStreamSegmenter,
    config: StreamingVadAdapterConfig = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start listening to the source. After stop() or end-of-stream this
   * begins a new stream on the same segmenter.
   */
  start(): void {
    if (this.subscriptions.length > 0) return; // Already started

    this.ended = false;
    this.segmenter.init();
    this.subscriptions.push(this.source.onChunk((chunk) => this.handleChunk(chunk)));
    if (this.source.onEnd) {
      this.subscriptions.push(this.source.onEnd(() => this.handleEnd()));
    }
  }

  /**
   * Stop listening and flush whatever segment is still open.
   */
  stop(): void {
    this.unsubscribeAll();
    this.finish();
  }

  /**
   * Segments finalized since the previous call, in ascending order.
   */
  nextSegments(): TimedSegment[] {
    const segments = this.pendingSegments;
    this.pendingSegments = [];
    return segments;
  }

  getDiagnostics(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  isEnded(): boolean {
    return this.ended;
  }

  private handleChunk(chunk: AudioChunk): void {
    try {
      this.pendingSegments.push(...this.segmenter.push(chunk));
    } catch (error) {
      if (!isVadError(error)) throw error;
      this.record(error);
    }
  }

  private handleEnd(): void {
    this.unsubscribeAll();
    if (this.config.flushOnEnd) {
      this.finish();
    }
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;

    this.pendingSegments.push(...this.segmenter.flush());
    this.segmenter.dispose();
    this.source.dispose?.();

    console.log(
      `[StreamingVad] Stream ended with ${this.diagnostics.length} diagnostic(s)`
    );
  }

  private unsubscribeAll(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }

  private record(error: VadError): void {
    const state = this.segmenter.getState();
    const category: DiagnosticCategory =
      error.code === "StreamClosed" ? "stream" : "input";

    this.diagnostics.push({
      id: `${this.segmenter.id}:${error.code}:${this.diagnostics.length}`,
      category,
      severity: "error",
      message: error.message,
      timestamp: state.samplesSeen / this.segmenter.config.sampleRate,
      source: this.segmenter.id,
    });
    console.warn(`[StreamingVad] Chunk rejected: ${error.message}`);
  }
}
