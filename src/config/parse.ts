import type { z } from 'zod'
import { SizeValueError } from '../errors/index.js'

function pluck(input: unknown, path: ReadonlyArray<string | number>): unknown {
	let current = input
	for (const key of path) {
		if (typeof current !== 'object' || current === null) return undefined
		current = Reflect.get(current, key)
	}
	return current
}

/**
 * Validate configuration input against a schema.
 *
 * @throws SizeValueError naming the first offending field
 */
export function parseConfig<S extends z.ZodTypeAny>(
	schema: S,
	input: unknown,
	name: string,
): z.output<S> {
	const result = schema.safeParse(input)
	if (result.success) return result.data

	const issue = result.error.issues[0]
	const path = issue?.path ?? []
	throw new SizeValueError(
		path.length > 0 ? pluck(input, path) : input,
		path.length > 0 ? path.join('.') : name,
		issue?.message,
		result.error,
	)
}
