import { describe, expect, test } from 'vitest'
import { nextOrLast, takeUntil } from './generators.js'

describe('takeUntil', () => {
	test('stops after the first satisfying item', () => {
		expect([...takeUntil((n: number) => n > 2, [1, 2, 3, 4, 5])]).toEqual([
			1, 2, 3,
		])
	})

	test('takes everything when nothing satisfies', () => {
		expect([...takeUntil(() => false, [4, 5, 6])]).toEqual([4, 5, 6])
	})

	test('takes only the first item when everything satisfies', () => {
		expect([...takeUntil(() => true, [4, 5, 6])]).toEqual([4])
		expect([...takeUntil(() => true, [])]).toEqual([])
	})

	test('does not pull past the satisfying item', () => {
		const pulled: number[] = []
		function* source() {
			for (const n of [1, 2, 3, 4]) {
				pulled.push(n)
				yield n
			}
		}

		expect([...takeUntil((n) => n === 2, source())]).toEqual([1, 2])
		expect(pulled).toEqual([1, 2])
	})
})

describe('nextOrLast', () => {
	test('returns the first satisfying item', () => {
		expect(nextOrLast((n) => n % 2 === 0, [1, 4, 6], -1)).toBe(4)
	})

	test('returns the last item when nothing satisfies', () => {
		expect(nextOrLast(() => false, [7, 8, 9], -1)).toBe(9)
	})

	test('returns the default for an empty sequence', () => {
		expect(nextOrLast(() => true, [], -1)).toBe(-1)
		expect(nextOrLast(() => false, [], -1)).toBe(-1)
	})
})
