import type { ByteSource, ChunkSource } from "./ChunkSource";
import type { AudioChunk } from "@vadpoint/contracts";

/**
 * Decodes little-endian signed 16-bit PCM into floats in [-1, 1).
 * A byte left over at the end of one chunk is joined with the first byte of
 * the next.
 */
export class Pcm16Decoder {
  private carry: number | null = null;

  decode(bytes: Uint8Array): Float32Array {
    const total = bytes.length + (this.carry === null ? 0 : 1);
    const samples = new Float32Array(Math.floor(total / 2));

    let byteIndex = 0;
    let sampleIndex = 0;
    if (this.carry !== null && bytes.length > 0) {
      samples[sampleIndex++] = toFloat(this.carry, bytes[0]);
      byteIndex = 1;
      this.carry = null;
    }
    for (; byteIndex + 1 < bytes.length; byteIndex += 2) {
      samples[sampleIndex++] = toFloat(bytes[byteIndex], bytes[byteIndex + 1]);
    }
    if (byteIndex < bytes.length) {
      this.carry = bytes[byteIndex];
    }

    return samples;
  }

  /** True when half a sample is waiting for its second byte */
  hasCarry(): boolean {
    return this.carry !== null;
  }

  reset(): void {
    this.carry = null;
  }
}

function toFloat(low: number, high: number): number {
  const value = (high << 8) | low;
  const signed = value >= 0x8000 ? value - 0x10000 : value;
  return signed / 32768;
}

/**
 * ChunkSource over a ByteSource carrying 16-bit PCM. Byte chunks that decode
 * to no complete sample are not forwarded. Each subscriber decodes with its
 * own carry.
 */
export class Pcm16ChunkSource implements ChunkSource {
  private decoders = new Set<Pcm16Decoder>();

  constructor(private bytes: ByteSource) {}

  onChunk(callback: (chunk: AudioChunk) => void): () => void {
    const decoder = new Pcm16Decoder();
    this.decoders.add(decoder);
    const unsubscribe = this.bytes.onData((data) => {
      const samples = decoder.decode(data);
      if (samples.length > 0) {
        callback({ kind: "signal", samples });
      }
    });
    return () => {
      unsubscribe();
      this.decoders.delete(decoder);
    };
  }

  onEnd(callback: () => void): () => void {
    if (!this.bytes.onEnd) {
      return () => {};
    }
    return this.bytes.onEnd(callback);
  }

  dispose(): void {
    for (const decoder of this.decoders) {
      decoder.reset();
    }
  }
}
