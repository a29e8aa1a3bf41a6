/**
 * Deployment flavour. Device simulation deployments have no device groups or
 * rules, only the default simulation is seeded.
 */
export const SolutionType = {
	REMOTE_MONITORING: 'remote-monitoring',
	DEVICE_SIMULATION: 'device-simulation',
} as const;

export type SolutionType = (typeof SolutionType)[keyof typeof SolutionType];

/** Accepted spellings after normalising, by type */
const SOLUTION_NAMES = new Map<string, SolutionType>([
	['remotemonitoring', SolutionType.REMOTE_MONITORING],
	['devicesimulation', SolutionType.DEVICE_SIMULATION],
	['devicesimulationnohub', SolutionType.DEVICE_SIMULATION],
]);

/**
 * Map a configured solution name to its type. Case, whitespace, dashes and
 * underscores are ignored, so "DeviceSimulation", "device-simulation" and
 * "DEVICE_SIMULATION" all select device simulation. Unknown names give null.
 */
export function parseSolutionType(value: string): SolutionType | null {
	const normalized = value.toLowerCase().replace(/[\s_-]/g, '');
	return SOLUTION_NAMES.get(normalized) ?? null;
}
