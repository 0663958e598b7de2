// Centralized external dependencies
// All npm imports go here so codec versions are swapped in one place

// Image encoding
export { encode as encodePng } from 'fast-png';
export { encode as encodeJpeg } from 'jpeg-js';

// Sixel encoding
export { image2sixel } from 'sixel';
