/**
 * Contract registry — aggregates all route contracts.
 */

export { bridgeRoutes } from './bridge.js';
export { deviceRoutes } from './devices.js';
export { sceneRoutes } from './scenes.js';

import { bridgeRoutes } from './bridge.js';
import { deviceRoutes } from './devices.js';
import { sceneRoutes } from './scenes.js';

/** The full contract registry. */
export const contract = {
  bridge: bridgeRoutes,
  devices: deviceRoutes,
  scenes: sceneRoutes,
} as const;
