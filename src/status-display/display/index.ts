export * from './canvas-surface.js';
export * from './framebuffer-transport.js';
export * from './rgb565.js';
