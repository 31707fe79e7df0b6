import { describe, expect, it, vi } from 'vitest'

import { createLogger, LOG_LEVEL_ENV, noopLogger, resolveLogLevel } from '@/logger.js'
import { MessageWriter } from '@/protocol/writer/message-writer.js'

describe('logger', () => {
	it('writes info logs as JSON', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger('info', { service: 'test' })
		logger.info('hello', { value: 1 })
		expect(spy).toHaveBeenCalledTimes(1)
		const payload = JSON.parse(spy.mock.calls[0]![0] as string)
		expect(payload.message).toBe('hello')
		expect(payload.service).toBe('test')
		expect(payload.value).toBe(1)
		spy.mockRestore()
	})

	it('routes error logs to console.error', () => {
		const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = createLogger('error')
		logger.error('boom')
		expect(spy).toHaveBeenCalledTimes(1)
		spy.mockRestore()
	})

	it('filters debug logs when level is info', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger('info')
		logger.debug('hidden')
		expect(spy).not.toHaveBeenCalled()
		spy.mockRestore()
	})

	it('silent disables every level', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const logger = createLogger('silent')
		logger.error('hidden')
		logger.info('hidden')
		expect(log).not.toHaveBeenCalled()
		expect(error).not.toHaveBeenCalled()
		log.mockRestore()
		error.mockRestore()
	})

	it('child logger merges context', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const logger = createLogger('info', { a: 1 })
		const child = logger.child({ b: 2 })
		child.info('child')
		const payload = JSON.parse(spy.mock.calls[0]![0] as string)
		expect(payload.a).toBe(1)
		expect(payload.b).toBe(2)
		spy.mockRestore()
	})

	it('noopLogger never logs', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		noopLogger.info('nope')
		noopLogger.debug('nope')
		expect(spy).not.toHaveBeenCalled()
		spy.mockRestore()
	})

	describe('resolveLogLevel', () => {
		it('parses levels case-insensitively', () => {
			expect(resolveLogLevel('DEBUG')).toBe('debug')
			expect(resolveLogLevel(' warn ')).toBe('warn')
		})

		it('falls back on missing or unknown levels', () => {
			expect(resolveLogLevel('verbose')).toBe('info')
			expect(resolveLogLevel('toString')).toBe('info')
			expect(resolveLogLevel('', 'error')).toBe('error')
		})

		it('reads the environment by default', () => {
			vi.stubEnv(LOG_LEVEL_ENV, 'silent')
			expect(resolveLogLevel()).toBe('silent')
			vi.unstubAllEnvs()
		})
	})

	it('logs encoded messages from a writer at debug level', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const writer = new MessageWriter({ logger: createLogger('debug') })
		writer.encode(null)
		expect(spy).toHaveBeenCalledTimes(1)
		const payload = JSON.parse(spy.mock.calls[0]![0] as string)
		expect(payload).toMatchObject({
			level: 'debug',
			message: 'message encoded',
			component: 'message-writer',
			protocolVersion: 3,
			messageType: 'Async',
			size: 10,
		})
		spy.mockRestore()
	})
})
