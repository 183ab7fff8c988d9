/**
 * Lazy sequence helpers used by the unit search.
 *
 * @module size/generators
 */

/**
 * Yield items up to and including the first one satisfying `predicate`.
 * Items after it are never pulled from the source.
 *
 * @example
 * ```ts
 * [...takeUntil((n) => n > 2, [1, 2, 3, 4])]; // [1, 2, 3]
 * ```
 */
export function* takeUntil<T>(
	predicate: (item: T) => boolean,
	items: Iterable<T>,
): Generator<T, void, undefined> {
	for (const item of items) {
		yield item
		if (predicate(item)) return
	}
}

/**
 * First item satisfying `predicate`; otherwise the last item; otherwise
 * `defaultValue` when there are no items.
 *
 * @example
 * ```ts
 * nextOrLast((n) => n > 2, [1, 3, 4], 0); // 3
 * nextOrLast((n) => n > 9, [1, 3, 4], 0); // 4
 * nextOrLast((n) => n > 9, [], 0); // 0
 * ```
 */
export function nextOrLast<T>(
	predicate: (item: T) => boolean,
	items: Iterable<T>,
	defaultValue: T,
): T {
	let last = defaultValue
	for (const item of items) {
		if (predicate(item)) return item
		last = item
	}
	return last
}
