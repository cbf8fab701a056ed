import { defaultStorePath, storePathEnvVar } from '../storage-engine'

export const sharedFlags = {
  storePath: {
    type: String,
    alias: 's',
    default: process.env[storePathEnvVar] ?? defaultStorePath,
    description: `Path to the log file (env: ${storePathEnvVar})`
  },
  verbose: {
    type: Boolean,
    alias: 'v',
    default: false,
    description: 'Log replay summaries and writes to stderr'
  }
}
