/**
 * Debug Logger
 *
 * File-based logging for picker debugging. Logs are written to
 * ~/.linepick/debug.log by default.
 *
 * stdout carries the picked text and the UI owns the terminal, so the
 * picker cannot log to the console. This logger writes to a file instead.
 *
 * Environment:
 *   LINEPICK_LOG_DIR  - directory for the log file
 *   LINEPICK_LOG_FILE - log file name
 *   LINEPICK_LOG      - "true" enables logging, "false" disables it
 */

import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"

import type { IPickerLogger } from "./interfaces.js"

// =============================================================================
// Configuration
// =============================================================================

const DEFAULT_LOG_DIR = path.join(os.homedir(), ".linepick")
const DEFAULT_LOG_FILE = "debug.log"
const MAX_LOG_SIZE = 10 * 1024 * 1024 // 10MB

export interface DebugLoggerOptions {
	/** Directory for the log file (default: $LINEPICK_LOG_DIR or ~/.linepick) */
	logDir?: string
	/** Log file name (default: $LINEPICK_LOG_FILE or debug.log) */
	logFile?: string
	/** Whether to write at all (default: $LINEPICK_LOG === "true") */
	enabled?: boolean
}

// =============================================================================
// Logger Class
// =============================================================================

export class DebugLogger implements IPickerLogger {
	private readonly logPath: string
	private enabled: boolean
	private stream: fs.WriteStream | null = null

	constructor(options: DebugLoggerOptions = {}) {
		const logDir = options.logDir ?? (process.env.LINEPICK_LOG_DIR || DEFAULT_LOG_DIR)
		const logFile = options.logFile ?? (process.env.LINEPICK_LOG_FILE || DEFAULT_LOG_FILE)
		this.logPath = path.join(logDir, logFile)

		// An explicit "false" wins over the option.
		this.enabled = process.env.LINEPICK_LOG !== "false" && (options.enabled ?? process.env.LINEPICK_LOG === "true")
	}

	/**
	 * Create the log directory and rotate the file if it is too large.
	 */
	private ensureLogFile(): void {
		if (!this.enabled || this.stream) return

		try {
			const logDir = path.dirname(this.logPath)
			if (!fs.existsSync(logDir)) {
				fs.mkdirSync(logDir, { recursive: true })
			}

			if (fs.existsSync(this.logPath)) {
				const stats = fs.statSync(this.logPath)
				if (stats.size > MAX_LOG_SIZE) {
					const rotatedPath = `${this.logPath}.1`
					if (fs.existsSync(rotatedPath)) {
						fs.unlinkSync(rotatedPath)
					}
					fs.renameSync(this.logPath, rotatedPath)
				}
			}

			this.stream = fs.createWriteStream(this.logPath, { flags: "a" })
		} catch (_error) {
			// Silently disable logging on error
			this.enabled = false
		}
	}

	/**
	 * Format a log message with timestamp and level.
	 */
	formatMessage(level: string, component: string, message: string, data?: unknown): string {
		const timestamp = new Date().toISOString()
		let formatted = `[${timestamp}] [${level}] [${component}] ${message}`

		if (data !== undefined) {
			try {
				formatted += `\n${JSON.stringify(data, null, 2)}`
			} catch {
				formatted += ` [Data: unserializable]`
			}
		}

		return formatted + "\n"
	}

	private write(level: string, component: string, message: string, data?: unknown): void {
		if (!this.enabled) return

		this.ensureLogFile()

		if (this.stream) {
			this.stream.write(this.formatMessage(level, component, message, data))
		}
	}

	info(component: string, message: string, data?: unknown): void {
		this.write("INFO", component, message, data)
	}

	debug(component: string, message: string, data?: unknown): void {
		this.write("DEBUG", component, message, data)
	}

	warn(component: string, message: string, data?: unknown): void {
		this.write("WARN", component, message, data)
	}

	error(component: string, message: string, data?: unknown): void {
		this.write("ERROR", component, message, data)
	}

	isEnabled(): boolean {
		return this.enabled
	}

	getLogPath(): string {
		return this.logPath
	}

	/**
	 * Flush and close the log file.
	 */
	close(): Promise<void> {
		const { stream } = this
		this.stream = null

		if (!stream) {
			return Promise.resolve()
		}

		return new Promise((resolve) => {
			stream.end(() => resolve())
		})
	}
}
