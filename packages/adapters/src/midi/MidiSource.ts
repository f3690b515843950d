/**
 * Abstraction over a live MIDI input device for dependency injection.
 * Device binding (USB gadget, OS ports) lives behind this interface, so
 * the adapter can be tested with a mock source.
 */

export interface MidiInputInfo {
  id: string;
  name: string;
  manufacturer?: string;
}

export type MidiConnectionState = "connected" | "disconnected";

export interface MidiMessage {
  /** One complete channel message: [status, data1, data2] */
  data: Uint8Array;
  /** Arrival time in milliseconds on the same clock as the scheduler */
  timestamp: number;
  /** Which input this came from */
  inputId: string;
}

export interface MidiSource {
  /**
   * Currently attached inputs.
   */
  getInputs(): MidiInputInfo[];

  /**
   * Subscribe to messages from all inputs.
   * Returns an unsubscribe function.
   */
  onMessage(callback: (msg: MidiMessage) => void): () => void;

  /**
   * Subscribe to attach/detach notifications.
   * Returns an unsubscribe function.
   */
  onStateChange?(callback: (input: MidiInputInfo, state: MidiConnectionState) => void): () => void;

  dispose?(): void;
}
