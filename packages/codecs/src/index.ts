/**
 * Image decoders. PNG is the only format.
 */
export * from './png'
