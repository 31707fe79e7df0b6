export { MessageWriter, type WriterConfig } from '@/protocol/writer/message-writer.js'
export { dispatch, registeredKinds } from '@/protocol/writer/dispatch.js'
export {
	DEFAULT_PROTOCOL_VERSION,
	DEFAULT_WRITE_OPTIONS,
	TEXT_ENCODINGS,
	resolveWriteOptions,
	type ResolvedWriteOptions,
	type TextEncoding,
	type WriteOptions,
} from '@/protocol/writer/options.js'
export { GUID_MIN_VERSION, NANO_TEMPORAL_MIN_VERSION } from '@/protocol/writer/version-gate.js'
export { HEADER_SIZE } from '@/protocol/writer/header.js'
export type { ErrorCategory, ErrorSignal } from '@/protocol/writer/signals.js'
