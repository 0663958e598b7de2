// term-raster library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Protocol selection
export * from './src/graphics/term-type.ts';
export * from './src/graphics/registry.ts';
export * from './src/graphics/default-encoder.ts';
export * from './src/graphics/environment.ts';
export * from './src/graphics/errors.ts';

// Images
export * from './src/graphics/pixels.ts';
export type {
  BaseCapabilities,
  DetectionMethod,
  EncoderOptions,
  GraphicsEncoder,
  PalettedImage,
  RasterImage,
  RgbaImage,
} from './src/graphics/types.ts';

// Kitty graphics protocol
export * from './src/kitty/detect.ts';
export * from './src/kitty/encoder.ts';
export type * from './src/kitty/types.ts';

// iTerm2 inline images protocol
export * from './src/iterm2/detect.ts';
export * from './src/iterm2/encoder.ts';
export type * from './src/iterm2/types.ts';

// Sixel graphics
export * from './src/sixel/mod.ts';

// Terminal I/O
export * from './src/runtime/mod.ts';

// Configuration and logging
export * from './src/config/mod.ts';
export {
  Logger,
  createLogger,
  getGlobalLogger,
  getLogger,
  setGlobalLogger,
  type ComponentLogger,
  type LogFormat,
  type LogLevel,
  type LoggerOptions,
} from './src/logging.ts';
