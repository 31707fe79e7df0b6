export * from '@/protocol/types/index.js'
export * from '@/protocol/writer/index.js'
export { Encoder, type IEncoder } from '@/protocol/primitives/index.js'
