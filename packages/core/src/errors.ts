/**
 * Engine error types.
 */

/**
 * A single item grew past the ingestion buffer before its separator arrived.
 * Fatal: ingestion stops and the session fails.
 */
export class IngestionOverflowError extends Error {
	readonly capacity: number
	readonly received: number

	constructor(capacity: number, received: number) {
		super(`Item too long: ${received} characters without a separator (buffer capacity is ${capacity})`)
		this.name = "IngestionOverflowError"
		this.capacity = capacity
		this.received = received
	}
}

/**
 * A collaborator broke the engine's calling contract.
 */
export class ContractViolationError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ContractViolationError"
	}
}

export function assertContract(condition: boolean, message: string): asserts condition {
	if (!condition) {
		throw new ContractViolationError(message)
	}
}
