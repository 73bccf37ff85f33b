/**
 * Lifecycle Script Generator
 *
 * Renders the bash scripts embedded in the notebook lifecycle configuration.
 * Follows the same contract as the in-process runtime:
 *   - on-create writes a setup script from the bootstrap plan and starts it
 *     detached; the setup script keeps the JSON status record current
 *   - on-start treats anything but a COMPLETED record (or, with no record,
 *     the legacy marker) as "not ready" and exits 0
 */

import { buildBootstrapPlan } from '../services/bootstrap/plan.js'
import { resolveBootstrapPaths } from '../services/bootstrap/paths.js'
import { NOT_READY_MESSAGE } from '../services/bootstrap/activator.js'
import {
  SYSTEMD_RESTART_ARGV,
  SYSTEMD_RUNTIME_DIR,
  UPSTART_RESTART_ARGV,
} from '../services/bootstrap/serviceRestarter.js'
import type { BootstrapPaths, BootstrapPlan, InitSystem } from '../services/bootstrap/types.js'
import { shellJoin, shellQuote } from '../utils/shellQuote.js'
import { getDefaultProfile } from './registry.js'
import type { BootstrapProfile, LifecycleScripts } from './schema.js'

export const DEFAULT_NOTEBOOK_USER = 'ec2-user'

export interface ScriptOptions {
  /** Account that owns the conda tree and runs the setup */
  user?: string
  /** Emit only this restart command instead of probing at start time */
  initSystem?: InitSystem
}

export interface RenderOptions extends ScriptOptions {
  profile?: BootstrapProfile
  paths?: BootstrapPaths
}

const TIMESTAMP = '"$(date -u +%Y-%m-%dT%H:%M:%SZ)"'

/**
 * Render the on-create hook: write the setup script, then start it in the
 * background as the notebook user.
 */
export function renderOnCreateScript(
  plan: BootstrapPlan,
  paths: BootstrapPaths,
  options: ScriptOptions = {},
): string {
  const user = options.user ?? DEFAULT_NOTEBOOK_USER
  const setupScript = shellQuote(paths.setupScript)

  return `#!/bin/bash
set -e

# Write the setup script; it runs detached so this hook returns immediately
cat << 'SETUP_EOF' > ${setupScript}
${renderSetupScript(plan, paths)}
SETUP_EOF

chmod +x ${setupScript}
sudo -u ${shellQuote(user)} -i nohup ${setupScript} >> ${shellQuote(paths.logFile)} 2>&1 &
`
}

/**
 * The setup script proper. Every plan step is preceded by an IN_PROGRESS
 * record naming it; the ERR trap turns any failure into a FAILED record.
 */
export function renderSetupScript(plan: BootstrapPlan, paths: BootstrapPaths): string {
  const steps = plan.steps
    .map(
      step => `# ${step.description}
CURRENT_STEP=${shellQuote(step.id)}
write_status IN_PROGRESS
${shellJoin(step.argv)}`,
    )
    .join('\n\n')

  return `#!/bin/bash
set -e
unset SUDO_UID

STATUS_FILE=${shellQuote(paths.statusFile)}
MARKER_FILE=${shellQuote(paths.markerFile)}
STARTED_AT=${TIMESTAMP}
CURRENT_STEP=""

write_status() {
  local now extra=""
  now=${TIMESTAMP}
  if [ -n "$CURRENT_STEP" ]; then extra="$extra,\\"step\\":\\"$CURRENT_STEP\\""; fi
  if [ -n "$2" ]; then extra="$extra,\\"error\\":\\"$2\\""; fi
  if [ "$1" = "IN_PROGRESS" ]; then extra="$extra,\\"pid\\":$$"; fi
  if [ "$1" = "COMPLETED" ]; then extra="$extra,\\"completedAt\\":\\"$now\\""; fi
  printf '{"state":"%s","updatedAt":"%s","startedAt":"%s"%s}\\n' "$1" "$now" "$STARTED_AT" "$extra" > "$STATUS_FILE.tmp"
  mv "$STATUS_FILE.tmp" "$STATUS_FILE"
}

trap 'write_status FAILED "Step $CURRENT_STEP exited with code $?"' ERR

rm -f "$MARKER_FILE"
export PATH=${shellJoin(plan.pathPrefix)}:"$PATH"

${steps}

CURRENT_STEP=""
write_status COMPLETED
touch "$MARKER_FILE"`
}

/**
 * Render the on-start hook: register every environment as a kernel and
 * restart the notebook server, or exit 0 while setup is unfinished.
 */
export function renderOnStartScript(paths: BootstrapPaths, options: ScriptOptions = {}): string {
  const user = options.user ?? DEFAULT_NOTEBOOK_USER

  return `#!/bin/bash
set -e

STATUS_FILE=${shellQuote(paths.statusFile)}
MARKER_FILE=${shellQuote(paths.markerFile)}

if [ -f "$STATUS_FILE" ]; then
    if ! grep -q '"state":"COMPLETED"' "$STATUS_FILE"; then
        echo "${NOT_READY_MESSAGE}"
        exit 0
    fi
elif ! [ -f "$MARKER_FILE" ]; then
    echo "${NOT_READY_MESSAGE}"
    exit 0
fi

sudo -u ${shellQuote(user)} -i <<'KERNELS_EOF'
set -e
unset SUDO_UID

for env in ${shellQuote(paths.envsRoot)}/*; do
    [ -d "$env" ] || continue
    BASENAME=$(basename "$env")
    "$env/bin/python" -m ipykernel install --user --name "$BASENAME" --display-name "Custom ($BASENAME)"
done
KERNELS_EOF

echo "Restarting the Jupyter server.."
${renderRestart(options.initSystem)}
`
}

function renderRestart(initSystem?: InitSystem): string {
  if (initSystem === 'systemd') return shellJoin(SYSTEMD_RESTART_ARGV)
  if (initSystem === 'upstart') return shellJoin(UPSTART_RESTART_ARGV)

  return `if [ -d ${SYSTEMD_RUNTIME_DIR} ]; then
    ${shellJoin(SYSTEMD_RESTART_ARGV)}
else
    ${shellJoin(UPSTART_RESTART_ARGV)}
fi`
}

/**
 * Both hooks for a profile, with the default profile and on-instance
 * layout unless overridden.
 */
export function renderLifecycleScripts(options: RenderOptions = {}): LifecycleScripts {
  const profile = options.profile ?? getDefaultProfile()
  const paths = options.paths ?? resolveBootstrapPaths()
  const plan = buildBootstrapPlan(profile, paths)

  return {
    onCreate: renderOnCreateScript(plan, paths, options),
    onStart: renderOnStartScript(paths, options),
  }
}
