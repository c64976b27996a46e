#!/usr/bin/env tsx
import { config } from 'dotenv'
import { applyEnvLogLevel, createProgram } from './program'

config({ path: ['.env.local', '.env'] })
applyEnvLogLevel(process.env.GROUPER_LOG_LEVEL)

await createProgram().parseAsync()
