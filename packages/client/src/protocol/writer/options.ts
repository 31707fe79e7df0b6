/**
 * Writer configuration and per-call conversion options
 */

import { z } from 'zod'
import { InvalidConfigError } from '@/errors.js'

export const TEXT_ENCODINGS = ['latin1', 'ascii', 'utf8'] as const
export type TextEncoding = (typeof TEXT_ENCODINGS)[number]

/** Protocol version spoken by kdb+ 3.0 and later */
export const DEFAULT_PROTOCOL_VERSION = 3

export const writeOptionsSchema = z
	.object({
		/** Send one-character strings as strings instead of char atoms */
		singleCharStrings: z.boolean().optional(),
	})
	.strict()

export type WriteOptions = z.infer<typeof writeOptionsSchema>

/**
 * Effective options of one write call
 */
export interface ResolvedWriteOptions {
	singleCharStrings: boolean
}

/**
 * Process-wide conversion defaults
 */
export const DEFAULT_WRITE_OPTIONS: Readonly<ResolvedWriteOptions> = Object.freeze({
	singleCharStrings: false,
})

export const writerConfigSchema = z.object({
	protocolVersion: z.number().int().min(0).max(255).default(DEFAULT_PROTOCOL_VERSION),
	encoding: z.enum(TEXT_ENCODINGS).default('latin1'),
	defaults: writeOptionsSchema.optional(),
})

export type WriterSettings = z.output<typeof writerConfigSchema>

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`)
}

/**
 * Validate writer settings and fill in defaults
 */
export function parseWriterSettings(input: unknown): WriterSettings {
	const result = writerConfigSchema.safeParse(input)
	if (!result.success) {
		throw new InvalidConfigError(formatIssues(result.error))
	}
	return result.data
}

/**
 * Merge options over defaults key by key. Keys left undefined keep the default.
 */
export function resolveWriteOptions(
	defaults: Readonly<ResolvedWriteOptions>,
	overrides?: WriteOptions
): ResolvedWriteOptions {
	if (overrides === undefined) {
		return { ...defaults }
	}

	const result = writeOptionsSchema.safeParse(overrides)
	if (!result.success) {
		throw new InvalidConfigError(formatIssues(result.error))
	}

	const resolved: ResolvedWriteOptions = { ...defaults }
	if (result.data.singleCharStrings !== undefined) {
		resolved.singleCharStrings = result.data.singleCharStrings
	}
	return resolved
}
