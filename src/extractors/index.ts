import type { ExtractorName } from "../config.ts";
import type { Extractor, ExtractorRegistration } from "./types.ts";
import { audioExtractorRegistration } from "./audio.ts";
import { videoExtractorRegistration } from "./video.ts";
import { ebookExtractorRegistration } from "./ebook.ts";

const registrations: ExtractorRegistration[] = [
  audioExtractorRegistration,
  videoExtractorRegistration,
  ebookExtractorRegistration,
];

const registrationMap = new Map<ExtractorName, ExtractorRegistration>();

for (const reg of registrations) {
  registrationMap.set(reg.name, reg);
}

export function getRegistration(name: ExtractorName): ExtractorRegistration | null {
  return registrationMap.get(name) ?? null;
}

/** Loads each named extractor once, in the given order */
export async function loadExtractors(names: readonly ExtractorName[]): Promise<Extractor[]> {
  const extractors: Extractor[] = [];
  for (const name of names) {
    const reg = getRegistration(name);
    if (reg) extractors.push(await reg.load());
  }
  return extractors;
}

export { createTaggedAudioExtractor, AUDIO_EXTENSIONS } from "./audio.ts";
export { createVideoContainerExtractor, VIDEO_EXTENSIONS, parseSeconds } from "./video.ts";
export { createEbookExtractor, EBOOK_EXTENSIONS } from "./ebook.ts";
export type {
  Extractor,
  ExtractorRegistration,
  DecodedAudio,
  TaggedAudioDecoder,
  MediaTrack,
  VideoContainerDecoder,
  MetadataItem,
  EbookMetadata,
  EbookMetadataDecoder,
} from "./types.ts";
