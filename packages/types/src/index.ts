/**
 * @pixel-recolor/types
 *
 * Shared type definitions for pixel-recolor.
 * This package contains zero runtime code, only TypeScript interfaces
 * and types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color } from './common';

// Bitmap and request
export type { Bitmap, EngineErrorKind, ReplacementRequest } from './bitmap';

// Event bus
export type { EventBus, EventCallback, RecolorEventMap } from './events';
