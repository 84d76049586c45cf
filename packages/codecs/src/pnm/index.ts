export { PpmCodec } from './codec'
export { decodePnm } from './decoder'
export * from './types'
