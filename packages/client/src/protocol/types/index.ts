export * from '@/protocol/types/type-tags.js'
export * from '@/protocol/types/values.js'
export * from '@/protocol/types/temporal.js'
