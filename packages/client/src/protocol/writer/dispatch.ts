/**
 * Runtime dispatch from a value to the writer of its kind
 *
 * Resolution order: null, error category, exact kind, primitive atom tag.
 */

import { UnsupportedTypeError } from '@/errors.js'
import { tagFor } from '@/protocol/types/type-tags.js'
import { atomWriters, writeAtom, writeNull } from '@/protocol/writer/atoms.js'
import { compositeWriters } from '@/protocol/writer/composites.js'
import {
	describeKind,
	kindOf,
	type ValueKind,
	type ValueWriter,
	type WriteContext,
	type WriterRegistration,
} from '@/protocol/writer/context.js'
import { functionWriters } from '@/protocol/writer/functions.js'
import { listWriters } from '@/protocol/writer/lists.js'
import { toErrorSignal, writeError } from '@/protocol/writer/signals.js'
import { stringWriters } from '@/protocol/writer/strings.js'

function buildWriterMap(registrations: readonly WriterRegistration[]): ReadonlyMap<ValueKind, ValueWriter> {
	const writers = new Map<ValueKind, ValueWriter>()
	for (const { kind, write } of registrations) {
		if (writers.has(kind)) {
			const name = typeof kind === 'function' ? kind.name : String(kind)
			throw new Error(`Duplicate writer registration for ${name}`)
		}
		writers.set(kind, write)
	}
	return writers
}

const WRITERS = buildWriterMap([
	...atomWriters,
	...stringWriters,
	...listWriters,
	...compositeWriters,
	...functionWriters,
])

/**
 * Kinds with a dedicated writer
 */
export function registeredKinds(): ValueKind[] {
	return [...WRITERS.keys()]
}

/**
 * Encode any supported value into the context's buffer
 */
export function dispatch(ctx: WriteContext, value: unknown): void {
	if (value === null || value === undefined) {
		writeNull(ctx)
		return
	}

	const signal = toErrorSignal(value)
	if (signal) {
		writeError(ctx, signal)
		return
	}

	const kind = kindOf(value)
	const writer = WRITERS.get(kind)
	if (writer) {
		writer(ctx, value)
		return
	}

	const tag = typeof kind === 'string' ? tagFor(kind) : undefined
	if (tag !== undefined) {
		writeAtom(ctx, value, tag)
		return
	}

	throw new UnsupportedTypeError(describeKind(value))
}
