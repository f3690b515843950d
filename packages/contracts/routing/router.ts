import type { Seconds, SessionMs } from "../core/time";
import type { EventOrigin } from "../core/provenance";
import type { ChannelMessage, MidiChannel, MidiNoteNumber } from "../raw/raw";

/**
 * Live input boundary: what a device callback delivers.
 */
export type LiveInputEvent =
  | {
      kind: "note_on" | "note_off";
      channel: MidiChannel;
      note: MidiNoteNumber;
      velocity: number;
      arrivalTimestamp: SessionMs;
    }
  | {
      kind: "control_change";
      channel: MidiChannel;
      controller: number;
      value: number;
      arrivalTimestamp: SessionMs;
    };

/**
 * An event waiting in one of the router's queues.
 */
export interface RoutedEvent {
  origin: EventOrigin;
  /** Timeline seconds: arrival time for live events, onset for file events */
  t: Seconds;
  message: ChannelMessage;
}

/**
 * Reported when the live queue dropped events since the previous drain.
 */
export interface QueueOverflow {
  kind: "queue_overflow";
  dropped: number;
  capacity: number;
}

export interface DrainResult {
  events: RoutedEvent[];
  overflow: QueueOverflow | null;
}

/**
 * Sink for live input (the router's live queue).
 */
export interface ILiveInputSink {
  pushLive(event: LiveInputEvent): void;
}
