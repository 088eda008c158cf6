/**
 * StreamSource
 *
 * Pumps a readable stream into the session in slices of at most `batchSize`
 * bytes, returning to the event loop between slices so key presses and
 * renders interleave with ingestion. A read error ends the input like EOF.
 */

import type { Readable } from "stream"

import { type IPickerLogger, NullLogger } from "@linepick/core"

export interface IngestionSink {
	feed(chunk: string | Uint8Array): void
	endOfStream(): void
}

export interface StreamSourceOptions {
	/** Largest slice handed to the sink per event-loop turn */
	batchSize: number
	/** Logger instance (optional, defaults to NullLogger) */
	logger?: IPickerLogger
}

type SourceState = "idle" | "reading" | "finished" | "stopped"

export class StreamSource {
	private readonly batchSize: number
	private readonly logger: IPickerLogger

	private state: SourceState = "idle"
	private pending: Buffer = Buffer.alloc(0)
	private pumping = false
	private ended = false
	private resolveDone: (() => void) | null = null

	constructor(
		private readonly stream: Readable,
		private readonly sink: IngestionSink,
		options: StreamSourceOptions,
	) {
		this.batchSize = Math.max(1, options.batchSize)
		this.logger = options.logger ?? new NullLogger()
	}

	/**
	 * Start reading. Resolves once the input is exhausted (after the sink has
	 * seen end-of-stream) or the source is stopped.
	 */
	start(): Promise<void> {
		if (this.state !== "idle") {
			return Promise.reject(new Error(`StreamSource cannot start: already ${this.state}`))
		}

		this.state = "reading"

		return new Promise((resolve) => {
			this.resolveDone = resolve
			this.stream.on("readable", this.onReadable)
			this.stream.on("end", this.onEnd)
			this.stream.on("error", this.onError)
			this.onReadable()
		})
	}

	/**
	 * Stop handing input to the sink. Does not signal end-of-stream.
	 */
	stop(): void {
		if (this.state !== "reading") {
			return
		}

		this.logger.debug("StreamSource", "Stopped before end of input")
		this.settle("stopped")
	}

	getState(): SourceState {
		return this.state
	}

	// ===========================================================================
	// Private Methods
	// ===========================================================================

	private readonly onReadable = (): void => {
		if (!this.pumping) {
			this.pump()
		}
	}

	private readonly onEnd = (): void => {
		this.ended = true

		if (!this.pumping) {
			this.finish()
		}
	}

	private readonly onError = (error: Error): void => {
		this.logger.warn("StreamSource", "Read failed, treating as end of input", { message: error.message })
		this.onEnd()
	}

	private pump(): void {
		if (this.state !== "reading") {
			this.pumping = false
			return
		}

		if (this.pending.length === 0) {
			const next: unknown = this.stream.read()

			if (next === null) {
				this.pumping = false

				if (this.ended) {
					this.finish()
				}

				return
			}

			this.pending = toBuffer(next)
		}

		this.pumping = true

		const slice = this.pending.subarray(0, this.batchSize)
		this.pending = this.pending.subarray(slice.length)
		this.sink.feed(slice)

		setImmediate(() => this.pump())
	}

	private finish(): void {
		if (this.state !== "reading") {
			return
		}

		this.sink.endOfStream()
		this.logger.debug("StreamSource", "End of input")
		this.settle("finished")
	}

	private settle(state: SourceState): void {
		this.state = state
		this.stream.off("readable", this.onReadable)
		this.stream.off("end", this.onEnd)
		this.stream.off("error", this.onError)

		const resolve = this.resolveDone
		this.resolveDone = null
		resolve?.()
	}
}

function toBuffer(chunk: unknown): Buffer {
	if (Buffer.isBuffer(chunk)) {
		return chunk
	}

	if (typeof chunk === "string") {
		return Buffer.from(chunk, "utf8")
	}

	if (chunk instanceof Uint8Array) {
		return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
	}

	throw new TypeError("StreamSource only reads byte or string streams")
}
