export { createSectionCodec, markersFor, normalizePayload } from './codec.js';
export type { SectionCodec } from './codec.js';
