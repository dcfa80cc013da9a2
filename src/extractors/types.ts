import type { AudioDialect, NormalizedRecord } from "../types.ts";
import type { ExtractorName } from "../config.ts";
import type { TagMap } from "../dialects/types.ts";

export interface Extractor {
  readonly name: string;
  /** Fixed when the extractor is built; never re-checked */
  readonly available: boolean;
  /** Cheap and side-effect free; false for good when the capability is missing */
  supports(filePath: string, extension: string, mime?: string): boolean;
  /** Resolves to null on any decode failure instead of rejecting */
  extract(filePath: string): Promise<NormalizedRecord | null>;
}

export interface ExtractorRegistration {
  name: ExtractorName;
  load: () => Promise<Extractor>;
}

// Decode capabilities

export interface DecodedAudio {
  dialect: AudioDialect;
  tags: TagMap;
  durationSeconds?: number;
}

export interface TaggedAudioDecoder {
  decode(filePath: string): Promise<DecodedAudio | null>;
}

export interface MediaTrack {
  /** MediaInfo track type: General, Video, Audio, Menu... */
  type: string;
  /** Lowercased attribute names */
  attributes: Readonly<Record<string, unknown>>;
}

export interface VideoContainerDecoder {
  decode(filePath: string): Promise<readonly MediaTrack[] | null>;
}

export interface MetadataItem {
  value: string;
  attributes: Readonly<Record<string, string>>;
}

/** Metadata groups keyed `<namespace>:<term>`, e.g. `DC:creator`, `OPF:meta` */
export type EbookMetadata = Readonly<Record<string, readonly MetadataItem[]>>;

export interface EbookMetadataDecoder {
  decode(filePath: string): Promise<EbookMetadata | null>;
}
