/**
 * Metadata module - EXIF capture dates
 */

export {
  readCaptureDate,
  captureDateFromTag,
  closeExifTool,
  type CaptureDateReader
} from './exif.js';
