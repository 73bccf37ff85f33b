/**
 * Profile Registry
 *
 * Static, code-defined registry of bootstrap profiles. The create phase
 * installs whichever profile is selected; only one ships today.
 */

import type { BootstrapProfile } from './schema.js'
import { tensorflowGpu } from './definitions/tensorflow-gpu.js'

// ─── Registry ────────────────────────────────────────────────────

export const DEFAULT_PROFILE_ID = tensorflowGpu.id

const profiles: BootstrapProfile[] = [tensorflowGpu]

const profileMap = new Map<string, BootstrapProfile>(
  profiles.map(p => [p.id, p])
)

// ─── Public API ──────────────────────────────────────────────────

export function getAllProfiles(): BootstrapProfile[] {
  return [...profiles]
}

export function getProfileById(id: string): BootstrapProfile | undefined {
  return profileMap.get(id)
}

export function getDefaultProfile(): BootstrapProfile {
  return tensorflowGpu
}
