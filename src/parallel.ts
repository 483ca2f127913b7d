/**
 * Bounded-concurrency task runner with an ora progress spinner
 *
 * Lines printed while the spinner spins must go through spinnerSafeLog(),
 * otherwise the spinner redraw eats them.
 */

import pLimit from "p-limit"
import ora, { type Ora } from "ora"
import { log } from "./logger.js"

export interface TaskFailure<T> {
	item: T
	error: string
}

export interface ParallelResult<T, R> {
	success: R[]
	failed: TaskFailure<T>[]
}

export interface ParallelOptions {
	concurrency: number
	/** Spinner prefix, e.g. "GB covers" */
	label: string
	/** No spinner at all */
	quiet: boolean
}

/** Handed to every task */
export interface TaskContext {
	/** Print a line without breaking the spinner */
	log: (message: string) => void
}

let activeSpinner: Ora | null = null

// Chain of pending prints; stop/print/start must not interleave
let printQueue = Promise.resolve()

export function spinnerSafeLog(message: string): void {
	log.parallel.debug(message)

	const spinner = activeSpinner
	if (!spinner) {
		console.log(message)
		return
	}

	printQueue = printQueue.then(
		() =>
			new Promise<void>(resolve => {
				const text = spinner.text
				spinner.stop()
				console.log(message)
				if (activeSpinner === spinner) spinner.start(text)
				setImmediate(resolve)
			}),
	)
}

/**
 * Run `task` over `items` with at most `concurrency` in flight.
 * A rejected task is recorded in `failed`; the others keep going.
 */
export async function runParallel<T, R>(
	items: readonly T[],
	task: (item: T, ctx: TaskContext) => Promise<R>,
	options: ParallelOptions,
): Promise<ParallelResult<T, R>> {
	const { concurrency, label, quiet } = options
	const limit = pLimit(concurrency)
	const total = items.length
	const result: ParallelResult<T, R> = { success: [], failed: [] }
	let done = 0

	const spinner =
		!quiet && total > 0 ? ora({ text: `${label}: 0/${total}` }).start() : null
	activeSpinner = spinner

	const ctx: TaskContext = { log: spinnerSafeLog }

	await Promise.all(
		items.map(item =>
			limit(async () => {
				try {
					result.success.push(await task(item, ctx))
				} catch (err) {
					result.failed.push({
						item,
						error: err instanceof Error ? err.message : String(err),
					})
				} finally {
					done += 1
					if (spinner) spinner.text = `${label}: ${done}/${total}`
				}
			}),
		),
	)

	await printQueue
	activeSpinner = null

	if (spinner) {
		if (result.failed.length === 0) {
			spinner.succeed(`${label}: ${total} done`)
		} else {
			spinner.warn(
				`${label}: ${result.success.length} done, ${result.failed.length} failed`,
			)
		}
	}

	return result
}
