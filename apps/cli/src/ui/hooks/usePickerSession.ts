/**
 * usePickerSession - Bridge PickerSession events to UI state
 *
 * Subscribes to the session's "change" and "outcome" events and copies the
 * visible items into the store. The query needs no copying: the session
 * already writes it to the store through the query accessor.
 *
 * Ingestion emits "change" once per input slice, and each snapshot copies
 * (and with sorting, re-sorts) every visible item, so changes are coalesced
 * into at most one snapshot per frame.
 */

import { useEffect } from "react"

import type { PickerSession } from "@linepick/core"

import type { PickerStore, SessionSnapshot } from "../store.js"

// About one ink frame
export const SYNC_INTERVAL_MS = 32

export interface UsePickerSessionOptions {
	session: PickerSession
	store: PickerStore
	/** Longest delay between a change and its snapshot (default: SYNC_INTERVAL_MS) */
	syncIntervalMs?: number
}

export function snapshotSession(session: PickerSession): SessionSnapshot {
	return {
		items: session.visibleItems(),
		totalCount: session.itemCount(),
		inputComplete: session.isInputComplete(),
		outcome: session.getOutcome(),
	}
}

/**
 * Keep the store in sync with the session. Syncs once right away, then at
 * most once per interval while changes keep coming; the outcome is synced
 * immediately.
 *
 * @returns Unsubscribe function that also drops a pending sync
 */
export function subscribeSession(
	session: PickerSession,
	store: PickerStore,
	syncIntervalMs: number = SYNC_INTERVAL_MS,
): () => void {
	let timer: ReturnType<typeof setTimeout> | null = null

	const sync = () => {
		if (timer !== null) {
			clearTimeout(timer)
			timer = null
		}

		store.getState().syncFromSession(snapshotSession(session))
	}

	const scheduleSync = () => {
		if (timer === null) {
			timer = setTimeout(sync, syncIntervalMs)
		}
	}

	// Items may have arrived before the first render.
	sync()

	session.on("change", scheduleSync)
	session.on("outcome", sync)

	return () => {
		session.off("change", scheduleSync)
		session.off("outcome", sync)

		if (timer !== null) {
			clearTimeout(timer)
			timer = null
		}
	}
}

export function usePickerSession({ session, store, syncIntervalMs }: UsePickerSessionOptions): void {
	useEffect(() => subscribeSession(session, store, syncIntervalMs), [session, store, syncIntervalMs])
}
