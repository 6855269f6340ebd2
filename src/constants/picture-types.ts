/**
 * Picture types shared by FLAC PICTURE blocks and ID3v2 APIC frames.
 */
export const PictureType = {
  Other: 0,
  FileIcon: 1,
  OtherFileIcon: 2,
  CoverFront: 3,
  CoverBack: 4,
  LeafletPage: 5,
  Media: 6,
  LeadArtist: 7,
  Artist: 8,
  Conductor: 9,
  Band: 10,
  Composer: 11,
  Lyricist: 12,
  RecordingLocation: 13,
  DuringRecording: 14,
  DuringPerformance: 15,
  MovieCapture: 16,
  BrightColouredFish: 17,
  Illustration: 18,
  BandLogo: 19,
  PublisherLogo: 20,
} as const;

export type PictureType = (typeof PictureType)[keyof typeof PictureType];

export const MAX_PICTURE_TYPE = 20;

const PICTURE_TYPE_LABELS: readonly string[] = [
  'Other',
  '32x32 pixels file icon',
  'Other file icon',
  'Cover (front)',
  'Cover (back)',
  'Leaflet page',
  'Media',
  'Lead artist/lead performer/soloist',
  'Artist/performer',
  'Conductor',
  'Band/Orchestra',
  'Composer',
  'Lyricist/text writer',
  'Recording Location',
  'During recording',
  'During performance',
  'Movie/video screen capture',
  'A bright coloured fish',
  'Illustration',
  'Band/artist logotype',
  'Publisher/Studio logotype',
];

export function isPictureType(value: number): value is PictureType {
  return Number.isInteger(value) && value >= 0 && value <= MAX_PICTURE_TYPE;
}

/**
 * Human readable name for a picture type, as used by FLAC and ID3v2.
 */
export function pictureTypeLabel(type: PictureType): string {
  return PICTURE_TYPE_LABELS[type] ?? `Unknown (${type})`;
}
