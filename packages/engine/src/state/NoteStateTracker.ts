/**
 * Note State Tracker
 *
 * The single model of which keys are down, fed by both file playback and
 * live input. One writer applies events; readers get an immutable snapshot
 * that is republished after every event, so a reader never sees half of
 * an update.
 */

import type {
  Hand,
  HandPolicy,
  INoteStateReader,
  MidiChannel,
  MidiNoteNumber,
  NoteKey,
  NoteStateSnapshot,
  NoteStatus,
  RoutedEvent,
} from "@lumitone/contracts";

import { SUSTAIN_PEDAL_CONTROLLER, isRelease, noteKey } from "@lumitone/contracts";

/**
 * Configuration for the NoteStateTracker.
 */
export interface NoteStateTrackerConfig {
  /**
   * Channel to hand mapping.
   * @default channel 1 → right, everything else → left
   */
  handPolicy?: HandPolicy;
}

export const DEFAULT_HAND_POLICY: HandPolicy = {
  channels: { 1: "right" },
  fallback: "left",
};

export function handForChannel(policy: HandPolicy, channel: MidiChannel): Hand {
  return policy.channels[channel] ?? policy.fallback;
}

export class NoteStateTracker implements INoteStateReader {
  readonly id = "note-state";

  private handPolicy: HandPolicy;
  private notes: Map<NoteKey, NoteStatus> = new Map();
  private sustainChannels: Set<MidiChannel> = new Set();
  private version = 0;
  private applying = false;

  private published: NoteStateSnapshot;
  private publishedActive: ReadonlySet<NoteKey> = new Set();

  constructor(config: NoteStateTrackerConfig = {}) {
    this.handPolicy = config.handPolicy ?? DEFAULT_HAND_POLICY;
    this.published = this.buildSnapshot();
  }

  setHandPolicy(policy: HandPolicy): void {
    this.handPolicy = policy;
  }

  handFor(channel: MidiChannel): Hand {
    return handForChannel(this.handPolicy, channel);
  }

  /**
   * Apply one routed event. Calls are serialized: applying from inside an
   * apply (e.g. from a listener) is an error.
   */
  apply(event: RoutedEvent): void {
    if (this.applying) {
      throw new Error("NoteStateTracker.apply is not re-entrant");
    }
    this.applying = true;

    try {
      const message = event.message;
      switch (message.kind) {
        case "note_on":
          if (isRelease(message)) {
            this.handleRelease(message.channel, message.note);
          } else {
            this.handleNoteOn(message.channel, message.note, message.velocity, event);
          }
          break;
        case "control_change":
          if (message.controller === SUSTAIN_PEDAL_CONTROLLER) {
            this.handleSustain(message.channel, message.value >= 64);
          }
          break;
      }

      this.version++;
      this.publish();
    } finally {
      this.applying = false;
    }
  }

  isActive(channel: MidiChannel, note: MidiNoteNumber): boolean {
    return this.publishedActive.has(noteKey(channel, note));
  }

  activeSet(): ReadonlySet<NoteKey> {
    return this.publishedActive;
  }

  snapshot(): NoteStateSnapshot {
    return this.published;
  }

  /**
   * Release every held or sustained note. Returns the keys that were
   * sounding.
   */
  allNotesOff(): NoteKey[] {
    const released = Array.from(this.notes.keys());
    this.notes.clear();
    this.sustainChannels.clear();
    this.version++;
    this.publish();
    return released;
  }

  /**
   * Clear all state. Useful for session reset.
   */
  reset(): void {
    this.notes.clear();
    this.sustainChannels.clear();
    this.version = 0;
    this.publish();
  }

  private handleNoteOn(
    channel: MidiChannel,
    note: MidiNoteNumber,
    velocity: number,
    event: RoutedEvent
  ): void {
    // A re-strike replaces the previous status outright
    this.notes.set(noteKey(channel, note), {
      channel,
      note,
      active: true,
      sustained: false,
      velocity,
      onSeconds: event.t,
      hand: this.handFor(channel),
      origin: event.origin,
    });
  }

  private handleRelease(channel: MidiChannel, note: MidiNoteNumber): void {
    const key = noteKey(channel, note);
    const existing = this.notes.get(key);
    if (!existing) return;

    if (this.sustainChannels.has(channel)) {
      this.notes.set(key, { ...existing, active: false, sustained: true });
    } else {
      this.notes.delete(key);
    }
  }

  private handleSustain(channel: MidiChannel, down: boolean): void {
    if (down) {
      this.sustainChannels.add(channel);
      return;
    }

    this.sustainChannels.delete(channel);
    for (const [key, status] of this.notes) {
      if (status.channel === channel && status.sustained) {
        this.notes.delete(key);
      }
    }
  }

  private publish(): void {
    this.published = this.buildSnapshot();
    const active = new Set<NoteKey>();
    for (const [key, status] of this.notes) {
      if (status.active) active.add(key);
    }
    this.publishedActive = active;
  }

  private buildSnapshot(): NoteStateSnapshot {
    return {
      version: this.version,
      notes: new Map(this.notes),
      sustainChannels: new Set(this.sustainChannels),
    };
  }
}
