export type Seconds = number;    // wall-clock position or duration
export type SampleRate = number; // samples per second (Hz)
export type SampleCount = number;
export type FrameIndex = number; // 0-based, frame i starts at i * hopLength samples
