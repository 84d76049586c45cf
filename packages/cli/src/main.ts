#!/usr/bin/env tsx
import { run } from './index'

run(process.argv.slice(2), process.env).then(
	(code) => {
		process.exitCode = code
	},
	(err: unknown) => {
		console.error('Fatal error:', err)
		process.exitCode = 1
	}
)
