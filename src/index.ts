/**
 * exactbytes
 *
 * Exact byte sizes: rational arithmetic, unit selection and display.
 *
 * Everything is re-exported here; subpath exports are available too:
 *   import { Size } from "exactbytes/size";
 *   import { MiB } from "exactbytes/units";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export * from './config/index.js'
export * from './errors/index.js'
export * from './logging/index.js'
export * from './radix/index.js'
export * from './rational/index.js'
export * from './size/index.js'
export * from './units/index.js'
