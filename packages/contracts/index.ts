export * from "./core/time";

// Input representations (signal, spectrogram, chunks)
export * from "./input/input";

export * from "./config/endpoint";

// Detector output
export * from "./segments/segments";

export * from "./stream/stream";

export * from "./pipeline/interfaces";

export * from "./diagnostics/diagnostics";

export * from "./errors/errors";
