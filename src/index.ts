/**
 * GPU Notebook Provisioner API
 *
 * Serves bootstrap status, kernel activation and the notebook stack template
 * over GraphQL, and runs the stalled-bootstrap watchdog alongside.
 */

import 'dotenv/config'
import { loadConfig } from './config/provisioner.js'
import { createProvisionerServices } from './services/bootstrap/index.js'
import { startProvisionerServer } from './server.js'
import { setLogLevel } from './utils/logger.js'

const config = loadConfig()
setLogLevel(config.logLevel)

startProvisionerServer(createProvisionerServices(config))
