/**
 * Where an event entered the engine.
 * - "live": a MIDI input device
 * - "file": the loaded timeline, released as the cursor passes it
 */
export type EventOrigin = "live" | "file";
