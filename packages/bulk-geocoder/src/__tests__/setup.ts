/**
 * Global Test Setup for the Bulk Geocoder
 *
 * - Quiet engine logs unless LOG_LEVEL is set explicitly
 * - Undo global stubs (fetch) and spies between tests
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import { afterEach, vi } from 'vitest';

process.env.LOG_LEVEL ??= 'error';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
