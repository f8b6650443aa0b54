import { describe, expect, test } from 'vitest'
import { parseArgs, UsageError } from './args'

describe('parseArgs', () => {
	test('collects inputs', () => {
		expect(parseArgs(['a.png', 'b.png'])).toEqual({ inputs: ['a.png', 'b.png'], options: {} })
	})

	test('flags', () => {
		expect(parseArgs(['-i', '--verbose', 'a.png']).options).toEqual({ info: true, verbose: true })
		expect(parseArgs(['--quiet']).options).toEqual({ quiet: true })
		expect(parseArgs(['--help', '-V']).options).toEqual({ help: true, version: true })
	})

	test('--width takes a column count', () => {
		expect(parseArgs(['-w', '80', 'a.png'])).toEqual({ inputs: ['a.png'], options: { width: 80 } })
		expect(parseArgs(['--width=40']).options.width).toBe(40)
	})

	test('--width rejects bad values', () => {
		expect(() => parseArgs(['--width'])).toThrow('--width requires a column count')
		expect(() => parseArgs(['-w', '0'])).toThrow('-w expects a positive integer, got "0"')
		expect(() => parseArgs(['--width=1.5'])).toThrow(UsageError)
	})

	test('unknown options', () => {
		expect(() => parseArgs(['--to', 'png'])).toThrow('Unknown option: --to')
	})

	test('--verbose and --quiet conflict', () => {
		expect(() => parseArgs(['-v', '-q'])).toThrow(UsageError)
	})

	test('--log-level takes a level name', () => {
		expect(parseArgs(['--log-level', 'info', 'a.png'])).toEqual({ inputs: ['a.png'], options: { logLevel: 'info' } })
		expect(parseArgs(['--log-level=silent']).options.logLevel).toBe('silent')
	})

	test('--log-level rejects unknown levels', () => {
		expect(() => parseArgs(['--log-level', 'loud'])).toThrow(
			'--log-level expects one of debug, info, warn, error, silent; got "loud"'
		)
		expect(() => parseArgs(['--log-level=toString'])).toThrow(UsageError)
		expect(() => parseArgs(['--log-level'])).toThrow('got ""')
	})

	test('--log-level does not mix with --verbose or --quiet', () => {
		expect(() => parseArgs(['--log-level', 'info', '-v'])).toThrow(
			'--log-level cannot be combined with --verbose or --quiet'
		)
	})
})
