export type { ChunkSource, ByteSource } from "./ChunkSource";
export { Pcm16Decoder, Pcm16ChunkSource } from "./Pcm16Decoder";
export { StreamingVadAdapter, type StreamingVadAdapterConfig } from "./StreamingVadAdapter";
