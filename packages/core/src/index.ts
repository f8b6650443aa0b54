export * from './log'
export * from './result'
export * from './types'
