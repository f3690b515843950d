/**
 * Live MIDI Adapter
 *
 * Decodes channel messages from a MidiSource and pushes them into the
 * engine's live input queue as they arrive. Decoding is protocol-level
 * only: note on/off and control change pass, everything else is counted
 * and ignored.
 */

import type { ILiveInputSink, LiveInputEvent, Ms } from "@lumitone/contracts";

import type { MidiInputInfo, MidiMessage, MidiSource } from "./MidiSource";

/**
 * Configuration for the live MIDI adapter.
 */
export interface LiveMidiAdapterConfig {
  /**
   * Clock reading at session start; arrival timestamps are relative to it.
   * @default 0
   */
  sessionStart: Ms;

  /**
   * Only accept messages from this input.
   * @default null (every input)
   */
  inputId: string | null;

  /** Called when an input we listen to disconnects */
  onDisconnect: ((inputId: string) => void) | null;

  /** Called when an input we listen to (re)connects */
  onConnect: ((inputId: string) => void) | null;
}

const DEFAULT_CONFIG: LiveMidiAdapterConfig = {
  sessionStart: 0,
  inputId: null,
  onDisconnect: null,
  onConnect: null,
};

const NOTE_OFF = 0x8;
const NOTE_ON = 0x9;
const CONTROL_CHANGE = 0xb;

/**
 * Decode one channel message. Returns null for anything the engine does
 * not track (program change, pitch bend, system messages, short data).
 */
export function decodeMessage(data: Uint8Array, arrivalTimestamp: Ms): LiveInputEvent | null {
  if (data.length < 3) return null;

  const status = data[0];
  const data1 = data[1];
  const data2 = data[2];
  const command = status >> 4;
  const channel = status & 0x0f;

  switch (command) {
    case NOTE_ON:
      // Zero velocity stays a note_on; the router treats it as a release
      return { kind: "note_on", channel, note: data1, velocity: data2, arrivalTimestamp };
    case NOTE_OFF:
      return { kind: "note_off", channel, note: data1, velocity: data2, arrivalTimestamp };
    case CONTROL_CHANGE:
      return { kind: "control_change", channel, controller: data1, value: data2, arrivalTimestamp };
    default:
      return null;
  }
}

export class LiveMidiAdapter {
  readonly id = "live-midi";

  private config: LiveMidiAdapterConfig;
  private midiSource: MidiSource;
  private sink: ILiveInputSink;
  private unsubscribers: Array<() => void> = [];

  private forwarded = 0;
  private ignored = 0;

  constructor(midiSource: MidiSource, sink: ILiveInputSink, config: Partial<LiveMidiAdapterConfig> = {}) {
    this.midiSource = midiSource;
    this.sink = sink;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get isListening(): boolean {
    return this.unsubscribers.length > 0;
  }

  /** Messages pushed to the sink since the last reset */
  get forwardedCount(): number {
    return this.forwarded;
  }

  /** Messages dropped as untracked or from another input */
  get ignoredCount(): number {
    return this.ignored;
  }

  /**
   * Start listening to MIDI events.
   */
  start(): void {
    if (this.isListening) return;

    this.unsubscribers.push(this.midiSource.onMessage((msg) => this.handleMessage(msg)));
    if (this.midiSource.onStateChange) {
      this.unsubscribers.push(
        this.midiSource.onStateChange((input, state) => this.handleStateChange(input, state))
      );
    }

    const inputs = this.midiSource.getInputs().map((i) => i.name);
    console.log(`[LiveMidiAdapter] Listening on ${inputs.length > 0 ? inputs.join(", ") : "no inputs"}`);
  }

  /**
   * Stop listening to MIDI events.
   */
  stop(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  reset(): void {
    this.forwarded = 0;
    this.ignored = 0;
  }

  private handleMessage(msg: MidiMessage): void {
    if (this.config.inputId !== null && msg.inputId !== this.config.inputId) {
      this.ignored++;
      return;
    }

    const event = decodeMessage(msg.data, msg.timestamp - this.config.sessionStart);
    if (!event) {
      this.ignored++;
      return;
    }

    this.forwarded++;
    this.sink.pushLive(event);
  }

  private handleStateChange(input: MidiInputInfo, state: "connected" | "disconnected"): void {
    if (this.config.inputId !== null && input.id !== this.config.inputId) return;

    if (state === "disconnected") {
      console.warn(`[LiveMidiAdapter] Input disconnected: ${input.name} (${input.id})`);
      this.config.onDisconnect?.(input.id);
    } else {
      console.log(`[LiveMidiAdapter] Input connected: ${input.name} (${input.id})`);
      this.config.onConnect?.(input.id);
    }
  }
}
