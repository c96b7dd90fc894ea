export enum CommandLane {
	/** Shared by every user; bounds how many claude processes run at once */
	Claude = 'claude',
}

/** Lane holding one user's exchanges, which run strictly one after another */
export const userLane = (userId: number | string) => `user:${userId}`

type QueueEntry = {
	task: () => Promise<unknown>
	resolve: (value: unknown) => void
	reject: (reason?: unknown) => void
}

type LaneState = {
	lane: string
	queue: QueueEntry[]
	active: number
	maxConcurrent: number
}

export type CommandQueue = {
	enqueueInLane: <T>(lane: string, task: () => Promise<T>) => Promise<T>
	setLaneConcurrency: (lane: string, maxConcurrent: number) => void
	/** Queued plus running tasks */
	getLaneSize: (lane: string) => number
}

export const createCommandQueue = (): CommandQueue => {
	const lanes = new Map<string, LaneState>()

	const getLaneState = (lane: string): LaneState => {
		const existing = lanes.get(lane)
		if (existing) return existing
		const created: LaneState = { lane, queue: [], active: 0, maxConcurrent: 1 }
		lanes.set(lane, created)
		return created
	}

	const pump = (state: LaneState) => {
		while (state.active < state.maxConcurrent) {
			const entry = state.queue.shift()
			if (!entry) break
			state.active += 1
			void (async () => {
				try {
					const result = await entry.task()
					entry.resolve(result)
				} catch (err) {
					entry.reject(err)
				} finally {
					state.active -= 1
					// Idle per-user lanes would otherwise pile up forever
					if (state.active === 0 && state.queue.length === 0 && state.maxConcurrent === 1) {
						lanes.delete(state.lane)
					} else {
						pump(state)
					}
				}
			})()
		}
	}

	return {
		enqueueInLane: <T>(lane: string, task: () => Promise<T>) => {
			const state = getLaneState(lane)
			return new Promise<T>((resolve, reject) => {
				state.queue.push({
					task,
					resolve: (value) => resolve(value as T),
					reject,
				})
				pump(state)
			})
		},

		setLaneConcurrency: (lane, maxConcurrent) => {
			const state = getLaneState(lane)
			state.maxConcurrent = Math.max(1, Math.floor(maxConcurrent))
			pump(state)
		},

		getLaneSize: (lane) => {
			const state = lanes.get(lane)
			if (!state) return 0
			return state.queue.length + state.active
		},
	}
}
