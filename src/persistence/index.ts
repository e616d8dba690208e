export {
  encodeTrack,
  decodeTrack,
  encodedSize,
  TRACK_MAGIC,
  TRACK_FORMAT_VERSION,
} from './codec.js';
export { saveTrack, loadTrack, TRACK_FILE_EXTENSION } from './track-file.js';
