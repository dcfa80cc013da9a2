export { ExtractorRegistry, buildDefaultRegistry, createRegistry } from "./registry.ts";
export type { DefaultRegistryOptions, RegistryDecoders } from "./registry.ts";
export { normalizeTrackDisc } from "./notation.ts";
export { TEXT_FIELDS, NUMBER_FIELDS } from "./types.ts";
export type {
  CanonicalField,
  NormalizedFields,
  NormalizedRecord,
  NumberField,
  TagFormat,
  TextField,
  TrackDiscPair,
} from "./types.ts";
export {
  createEbookExtractor,
  createTaggedAudioExtractor,
  createVideoContainerExtractor,
  loadExtractors,
} from "./extractors/index.ts";
export type {
  DecodedAudio,
  EbookMetadata,
  EbookMetadataDecoder,
  Extractor,
  MediaTrack,
  MetadataItem,
  TaggedAudioDecoder,
  VideoContainerDecoder,
} from "./extractors/index.ts";
export {
  AUDIO_DIALECTS,
  GENERAL_FIELDS,
  ID3_FIELDS,
  MP4_FIELDS,
  OPF_FIELDS,
  RIFF_FIELDS,
  VORBIS_FIELDS,
} from "./dialects/index.ts";
export { loadTaggedAudioDecoder } from "./decoders/music-metadata.ts";
export { loadVideoContainerDecoder } from "./decoders/mediainfo.ts";
export { loadEbookMetadataDecoder } from "./decoders/opf.ts";
export { LoggerService, LiveLoggerService } from "./effect/services.ts";
export { isolate } from "./effect/boundary.ts";
export { loadConfig, loadConfigWithDefaults, ConfigError, EXTRACTOR_NAMES } from "./config.ts";
export type { Config, ExtractorName, LoadedConfig } from "./config.ts";
export { DecodeError, ExtractionError, ExtractorFaultError, ToolUnavailableError } from "./utils/errors.ts";
