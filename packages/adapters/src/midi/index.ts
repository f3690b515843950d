export type { MidiSource, MidiMessage, MidiInputInfo, MidiConnectionState } from "./MidiSource";
export { LiveMidiAdapter, decodeMessage, type LiveMidiAdapterConfig } from "./LiveMidiAdapter";
export { MidiFileSource, parseMidiBuffer, toRawEvent, DEFAULT_FILE_TEMPO } from "./MidiFileSource";
