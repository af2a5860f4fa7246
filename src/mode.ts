import { NUL, SPACE, ZERO } from "./constants";
import type { FileMode, Permissions, SpecialBits } from "./types";

/**
 * Builds a {@link FileMode} from a numeric mode such as `0o644` or `0o4755`.
 */
export function modeFromNumber(value: number): FileMode {
	return {
		owner: permissionsFromDigit((value >> 6) & 7),
		group: permissionsFromDigit((value >> 3) & 7),
		other: permissionsFromDigit(value & 7),
		special: {
			setuid: (value & 0o4000) !== 0,
			setgid: (value & 0o2000) !== 0,
			sticky: (value & 0o1000) !== 0,
		},
	};
}

/**
 * Converts a {@link FileMode} back to its numeric form.
 */
export function modeToNumber(mode: FileMode): number {
	return (
		(specialDigit(mode.special) << 9) |
		(permissionDigit(mode.owner) << 6) |
		(permissionDigit(mode.group) << 3) |
		permissionDigit(mode.other)
	);
}

/**
 * Formats the 8-byte mode field.
 *
 * Layout: two pad zeros, the special-bits digit, one digit per permission triple,
 * a reserved space and a NUL. Without special bits this reads `"000644 \0"`.
 */
export function encodeMode(mode: FileMode): string {
	return (
		"00" +
		digitChar(specialDigit(mode.special)) +
		digitChar(permissionDigit(mode.owner)) +
		digitChar(permissionDigit(mode.group)) +
		digitChar(permissionDigit(mode.other)) +
		String.fromCharCode(SPACE) +
		String.fromCharCode(NUL)
	);
}

/** rw-r--r-- */
export const DEFAULT_FILE_MODE: FileMode = modeFromNumber(0o644);

/** rwxr-xr-x */
export const DEFAULT_DIR_MODE: FileMode = modeFromNumber(0o755);

function permissionDigit(permissions: Permissions): number {
	return (
		(permissions.read ? 4 : 0) +
		(permissions.write ? 2 : 0) +
		(permissions.execute ? 1 : 0)
	);
}

function specialDigit(special: SpecialBits | undefined): number {
	if (!special) return 0;

	return (
		(special.setuid ? 4 : 0) +
		(special.setgid ? 2 : 0) +
		(special.sticky ? 1 : 0)
	);
}

function permissionsFromDigit(digit: number): Permissions {
	return {
		read: (digit & 4) !== 0,
		write: (digit & 2) !== 0,
		execute: (digit & 1) !== 0,
	};
}

function digitChar(digit: number): string {
	return String.fromCharCode(ZERO + digit);
}
