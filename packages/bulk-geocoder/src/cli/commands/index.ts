/**
 * CLI Commands Index
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { Command } from 'commander';
import { registerGeocodeCommand } from './geocode.js';

export { registerGeocodeCommand, executeGeocode, buildMapping } from './geocode.js';
export type { GeocodeOptions, GeocodeCommandContext } from './geocode.js';

/**
 * Register all commands
 *
 * @param program - Commander program instance
 */
export function registerCommands(program: Command): void {
  registerGeocodeCommand(program);
}
