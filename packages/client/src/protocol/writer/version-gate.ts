import { ProtocolVersionError } from '@/errors.js'
import { atomTagOf, describeTag, TypeTag } from '@/protocol/types/type-tags.js'

/** Guid arrived with kdb+ 3.0 */
export const GUID_MIN_VERSION = 3
/** Timestamp and timespan arrived with kdb+ 2.6 */
export const NANO_TEMPORAL_MIN_VERSION = 1

export function requireGuidSupport(protocolVersion: number): void {
	if (protocolVersion < GUID_MIN_VERSION) {
		throw new ProtocolVersionError('Guid', GUID_MIN_VERSION, protocolVersion)
	}
}

/**
 * Reject timestamp and timespan atoms or lists below version 1; other tags pass
 */
export function requireTemporalSupport(tag: number, protocolVersion: number): void {
	const atomTag = atomTagOf(tag)
	if (
		(atomTag === TypeTag.Timestamp || atomTag === TypeTag.Timespan) &&
		protocolVersion < NANO_TEMPORAL_MIN_VERSION
	) {
		throw new ProtocolVersionError(describeTag(tag), NANO_TEMPORAL_MIN_VERSION, protocolVersion)
	}
}
