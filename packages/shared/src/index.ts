/**
 * @hostpanel/shared
 * Wire types shared by the host panel console packages.
 * This package contains ONLY type definitions, no runtime code.
 */

export type * from './types/api.js';
export type * from './types/payloads.js';
export type * from './types/control.js';
