/**
 * Minimal 3D vector helpers for the swarm
 */

export type Vec3 = {
  x: number
  y: number
  z: number
}

export const zero = (): Vec3 => ({ x: 0, y: 0, z: 0 })

export const lengthSquared = (v: Vec3): number => v.x * v.x + v.y * v.y + v.z * v.z

export const length = (v: Vec3): number => Math.sqrt(lengthSquared(v))
