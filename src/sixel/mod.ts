// Sixel graphics module
// Provides terminal sixel detection and encoding

export * from './detect.ts';
export * from './encoder.ts';
