export type Ms = number;        // milliseconds (durations, intervals)
export type SessionMs = number; // ms since session start
export type Seconds = number;
export type Ticks = number;     // MIDI ticks, resolution-dependent
export type MicrosPerBeat = number;
export type Percent = number;   // 100 = unscaled
