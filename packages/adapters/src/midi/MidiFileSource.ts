/**
 * MIDI File Source
 *
 * Reads a Standard MIDI File from disk and hands the engine its tracks as
 * raw events. Byte-level parsing is done by midi-file; this module only
 * maps its event shapes onto ours.
 */

import { readFile, stat } from "fs/promises";
import { resolve } from "path";
import { parseMidi, type MidiData } from "midi-file";

import type {
  MicrosPerBeat,
  ParsedTracks,
  RawEvent,
  SourceIdentity,
  TimelineSource,
} from "@lumitone/contracts";
import { MalformedTimelineError } from "@lumitone/contracts";

type MidiFileEvent = MidiData["tracks"][number][number];

/** 120 BPM, the SMF default when a file carries no tempo event */
export const DEFAULT_FILE_TEMPO: MicrosPerBeat = 500_000;

/**
 * Map one midi-file event onto a raw event of the given track.
 */
export function toRawEvent(event: MidiFileEvent, track: number): RawEvent {
  const deltaTicks = event.deltaTime;

  switch (event.type) {
    case "noteOn":
      return {
        kind: "note_on",
        channel: event.channel,
        note: event.noteNumber,
        velocity: event.velocity,
        deltaTicks,
        track,
      };
    case "noteOff":
      return {
        kind: "note_off",
        channel: event.channel,
        note: event.noteNumber,
        velocity: event.velocity,
        deltaTicks,
        track,
      };
    case "controller":
      return {
        kind: "control_change",
        channel: event.channel,
        controller: event.controllerType,
        value: event.value,
        deltaTicks,
        track,
      };
    case "setTempo":
      return {
        kind: "meta",
        meta: { type: "tempo", microsecondsPerBeat: event.microsecondsPerBeat },
        deltaTicks,
        track,
      };
    case "endOfTrack":
      return { kind: "meta", meta: { type: "end_of_track" }, deltaTicks, track };
    default:
      // Kept so later deltas stay correct
      return { kind: "meta", meta: { type: "other", name: event.type }, deltaTicks, track };
  }
}

/**
 * Parse SMF bytes into per-track raw events.
 */
export function parseMidiBuffer(data: Uint8Array): ParsedTracks {
  let midi: MidiData;
  try {
    midi = parseMidi(data);
  } catch (e) {
    throw new MalformedTimelineError(`Not a readable MIDI file: ${e instanceof Error ? e.message : e}`);
  }

  const resolution = midi.header.ticksPerBeat;
  if (resolution === undefined) {
    throw new MalformedTimelineError("SMPTE time division is not supported");
  }

  return {
    resolution,
    initialTempo: DEFAULT_FILE_TEMPO,
    tracks: midi.tracks.map((events, track) => events.map((event) => toRawEvent(event, track))),
  };
}

export class MidiFileSource implements TimelineSource {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async identity(): Promise<SourceIdentity> {
    const info = await stat(this.path);
    return { path: this.path, modifiedMs: info.mtimeMs };
  }

  async read(): Promise<ParsedTracks> {
    const data = await readFile(this.path);
    const parsed = parseMidiBuffer(data);
    console.log(`[MidiFileSource] Read ${this.path}: ${parsed.tracks.length} track(s), ${parsed.resolution} ticks/beat`);
    return parsed;
  }
}
