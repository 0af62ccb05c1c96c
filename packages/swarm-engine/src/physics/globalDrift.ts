/**
 * Global drift: one shared, momentum-damped random walk applied to every
 * particle as a common-mode bias.
 */

import { centered } from '../lib/random'
import type { RandomSource } from '../lib/random'
import type { Vec3 } from '../lib/vector'

export function updateGlobalDrift(
  drift: Vec3,
  strength: number,
  momentum: number,
  random: RandomSource,
): void {
  drift.x = drift.x * momentum + centered(random) * strength
  drift.y = drift.y * momentum + centered(random) * strength
  drift.z = drift.z * momentum + centered(random) * strength
}
