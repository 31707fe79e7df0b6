export { Encoder, HOST_LITTLE_ENDIAN } from '@/protocol/primitives/encoder.js'
export type { IEncoder } from '@/protocol/primitives/types.js'
