import fs from "fs"
import tty from "tty"

export const TERMINAL_DEVICE = "/dev/tty"

/**
 * Open the controlling terminal for key input. Standard input carries the
 * items, so keys have to come from somewhere else.
 */
export function openTerminalInput(device = TERMINAL_DEVICE): tty.ReadStream {
	const fd = fs.openSync(device, "r")
	return new tty.ReadStream(fd)
}
