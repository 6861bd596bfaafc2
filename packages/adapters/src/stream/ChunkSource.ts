/**
 * Abstraction over audio chunk producers for dependency injection.
 * Lets the streaming adapter be tested without a microphone, socket or
 * decoder process.
 */

import type { AudioChunk } from "@vadpoint/contracts";

export interface ChunkSource {
  /**
   * Subscribe to chunks in arrival order.
   * Returns an unsubscribe function.
   */
  onChunk(callback: (chunk: AudioChunk) => void): () => void;

  /**
   * Subscribe to end-of-stream.
   * Returns an unsubscribe function.
   */
  onEnd?(callback: () => void): () => void;

  /**
   * Clean up resources. Called at the end of every stream; a restarted
   * adapter subscribes again afterwards.
   */
  dispose?(): void;
}

/**
 * Raw byte producer (e.g. a decoder's stdout or a socket).
 */
export interface ByteSource {
  onData(callback: (bytes: Uint8Array) => void): () => void;
  onEnd?(callback: () => void): () => void;
}
