/**
 * hdrmerge CLI - merge bracketed exposures into one float radiance map
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { basename, dirname, join, relative, resolve } from 'node:path'
import { encodePfm, createImageDecoder, supportedFormats } from '@poisson-hdr/codecs'
import {
	type ChannelCoefficients,
	DEFAULT_BASE_ISO,
	MetadataError,
	type MetadataProvider,
	type SourceReader,
	toHdrMergeError,
} from '@poisson-hdr/core'
import { type MergeProgress, calculatePoissonEstimate } from '@poisson-hdr/merge'
import {
	type SidecarDocument,
	createExifMetadataProvider,
	createSidecarMetadataProvider,
	parseSidecarJson,
} from '@poisson-hdr/metadata'
import { z } from 'zod'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Options as they appear on the command line, before validation */
export interface RawOptions {
	out?: string
	sidecar?: string
	exposures?: string
	gains?: string
	baseIso?: string
	coefficients?: string

	overwrite?: boolean
	dryRun?: boolean
	verbose?: boolean
	quiet?: boolean

	help?: boolean
	version?: boolean
}

/** Bad flags or arguments, reported with exit code 2 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

export type Env = Record<string, string | undefined>

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

const HELP = `
hdrmerge - Merge bracketed exposures with the Poisson photon noise estimator

USAGE:
  hdrmerge <inputs...> [-o <output.pfm>] [options]

INPUT:
  - Image files, merged in the given order: a.tif b.tif c.tif
  - Glob patterns, expanded in sorted order: "bracket/*.tif"
  - Formats: ${supportedFormats().join(', ')}

OPTIONS:
  -o, --out <file>          Output PFM path (default merged.pfm)
  -s, --sidecar <file>      JSON sidecar with exposure/gain per input
  -e, --exposures <list>    Comma-separated exposure times in seconds
  -g, --gains <list>        Comma-separated gains (requires --exposures)
  --base-iso <n>            ISO that maps to gain 1 (default ${DEFAULT_BASE_ISO})
  --coefficients <r,g,b>    Channel coefficients (default 1,1,1)
  --overwrite               Overwrite an existing output
  --dry-run                 Show what would be done without doing it
  -v, --verbose             Verbose output (or HDRMERGE_VERBOSE=1)
  --quiet                   Suppress output
  --help                    Show this help
  --version                 Show version

Without --sidecar or --exposures, exposure time and ISO are read from the
EXIF block of each input (JPEG or TIFF).

SIDECAR:
  { "images": { "a.tif": { "exposure": 0.01, "iso": 200 } } }
  Paths are relative to the sidecar file. Gain is "gain", else iso / base ISO, else 1.

EXAMPLES:
  hdrmerge a.tif b.tif c.tif -o scene.pfm         # EXIF exposure and ISO
  hdrmerge "bracket/*.pfm" -s bracket/exif.json   # Sidecar metadata
  hdrmerge a.ppm b.ppm -e 0.01,0.1 -g 1,2         # Inline exposures and gains
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

const VALUE_FLAGS = new Map<string, keyof RawOptions>([
	['-o', 'out'],
	['--out', 'out'],
	['-s', 'sidecar'],
	['--sidecar', 'sidecar'],
	['-e', 'exposures'],
	['--exposures', 'exposures'],
	['-g', 'gains'],
	['--gains', 'gains'],
	['--base-iso', 'baseIso'],
	['--coefficients', 'coefficients'],
])

export function parseArgs(args: readonly string[]): { inputs: string[]; options: RawOptions } {
	const inputs: string[] = []
	const options: RawOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''
		const valueKey = VALUE_FLAGS.get(arg)

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (valueKey) {
			const value = args[++i]
			if (value === undefined) {
				throw new UsageError(`Missing value for ${arg}`)
			}
			setValue(options, valueKey, value)
		} else if (!arg.startsWith('-') || arg === '-') {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

function setValue(options: RawOptions, key: keyof RawOptions, value: string): void {
	switch (key) {
		case 'out':
		case 'sidecar':
		case 'exposures':
		case 'gains':
		case 'baseIso':
		case 'coefficients':
			options[key] = value
			break
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Option Validation
// ─────────────────────────────────────────────────────────────────────────────

const positive = z.coerce.number().finite().positive()

const commaList = z.string().transform((value) => value.split(',').map((part) => part.trim()))

const numberList = commaList.pipe(z.array(positive).min(1))

const coefficientTriple = commaList
	.pipe(z.tuple([positive, positive, positive]))
	.transform(([red, green, blue]): ChannelCoefficients => ({ red, green, blue }))

export const cliOptionsSchema = z
	.object({
		out: z.string().min(1).default('merged.pfm'),
		sidecar: z.string().min(1).optional(),
		exposures: numberList.optional(),
		gains: numberList.optional(),
		baseIso: positive.default(DEFAULT_BASE_ISO),
		coefficients: coefficientTriple.optional(),
		overwrite: z.boolean().default(false),
		dryRun: z.boolean().default(false),
		verbose: z.boolean().default(false),
		quiet: z.boolean().default(false),
	})
	.refine((options) => options.gains === undefined || options.exposures !== undefined, {
		message: '--gains requires --exposures',
		path: ['gains'],
	})
	.refine((options) => options.sidecar === undefined || options.exposures === undefined, {
		message: '--sidecar and --exposures are mutually exclusive',
		path: ['sidecar'],
	})

export type CliOptions = z.output<typeof cliOptionsSchema>

const FLAG_NAMES: Record<string, string> = {
	out: '--out',
	sidecar: '--sidecar',
	exposures: '--exposures',
	gains: '--gains',
	baseIso: '--base-iso',
	coefficients: '--coefficients',
}

export function validateOptions(raw: RawOptions, env: Env = {}): CliOptions {
	const result = cliOptionsSchema.safeParse(raw)
	if (!result.success) {
		const issue = result.error.issues[0]
		const field = issue?.path[0]
		const flag = typeof field === 'string' ? (FLAG_NAMES[field] ?? field) : 'options'
		throw new UsageError(`Invalid ${flag}: ${issue?.message ?? 'invalid value'}`)
	}

	const options = result.data
	if (raw.verbose === undefined && raw.quiet === undefined && env.HDRMERGE_VERBOSE === '1') {
		options.verbose = true
	}
	return options
}

// ─────────────────────────────────────────────────────────────────────────────
// Glob Pattern Matching
// ─────────────────────────────────────────────────────────────────────────────

function hasGlob(pattern: string): boolean {
	return pattern.includes('*') || pattern.includes('?')
}

function matchGlob(pattern: string, str: string): boolean {
	const regexPattern = pattern
		.replace(/[.+^${}()|[\]\\]/g, '\\$&')
		.replace(/\*\*/g, '<<<GLOBSTAR>>>')
		.replace(/\*/g, '[^/]*')
		.replace(/<<<GLOBSTAR>>>/g, '.*')
		.replace(/\?/g, '.')

	return new RegExp(`^${regexPattern}$`).test(str)
}

export function expandGlob(pattern: string, baseDir = '.'): string[] {
	const results: string[] = []

	if (!hasGlob(pattern)) {
		const fullPath = resolve(baseDir, pattern)
		if (existsSync(fullPath) && statSync(fullPath).isFile()) {
			return [fullPath]
		}
		return []
	}

	// Split into the literal base directory and the glob part
	const parts = pattern.split('/')
	const baseParts: string[] = []
	const patternParts: string[] = []
	let foundGlob = false

	for (const part of parts) {
		if (foundGlob || hasGlob(part)) {
			foundGlob = true
			patternParts.push(part)
		} else {
			baseParts.push(part)
		}
	}

	const resolvedBase = baseParts.length > 0 ? resolve(baseDir, baseParts.join('/') || '/') : resolve(baseDir)

	const filePattern = patternParts.join('/')
	const isRecursive = filePattern.includes('**')

	function walk(dir: string): void {
		if (!existsSync(dir)) return

		for (const entry of readdirSync(dir, { withFileTypes: true })) {
			const fullPath = join(dir, entry.name)
			const relativePath = relative(resolvedBase, fullPath)

			if (entry.isDirectory()) {
				if (isRecursive) walk(fullPath)
			} else if (entry.isFile() && matchGlob(filePattern, relativePath)) {
				results.push(fullPath)
			}
		}
	}

	walk(resolvedBase)
	return results.sort()
}

// ─────────────────────────────────────────────────────────────────────────────
// Metadata Sources
// ─────────────────────────────────────────────────────────────────────────────

const readSource: SourceReader = async (identifier) => new Uint8Array(await readFile(identifier))

/**
 * Sidecar keys are resolved against the sidecar's own directory
 */
function loadSidecar(path: string): SidecarDocument {
	let text: string
	try {
		text = readFileSync(path, 'utf8')
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		throw new MetadataError(`Cannot read sidecar ${path}: ${reason}`, { cause: err })
	}

	const document = parseSidecarJson(text)
	const base = dirname(resolve(path))
	const images: SidecarDocument['images'] = {}
	for (const [key, entry] of Object.entries(document.images)) {
		images[resolve(base, key)] = entry
	}
	return { images }
}

function inlineMetadata(
	inputs: readonly string[],
	exposures: readonly number[],
	gains?: readonly number[]
): MetadataProvider {
	if (exposures.length !== inputs.length) {
		throw new UsageError(`--exposures lists ${exposures.length} values for ${inputs.length} inputs`)
	}
	if (gains && gains.length !== inputs.length) {
		throw new UsageError(`--gains lists ${gains.length} values for ${inputs.length} inputs`)
	}

	// Values follow the input order, so a repeated input keeps each of its values
	const byPosition = (identifiers: readonly string[], values: readonly number[], flag: string): number[] => {
		if (identifiers.length !== values.length) {
			throw new MetadataError(`${flag} lists ${values.length} values for ${identifiers.length} inputs`)
		}
		return [...values]
	}

	return {
		async getExposures(identifiers) {
			return byPosition(identifiers, exposures, '--exposures')
		},
		async getGains(identifiers) {
			return gains ? byPosition(identifiers, gains, '--gains') : identifiers.map(() => 1)
		},
	}
}

function describeSource(options: CliOptions): string {
	if (options.exposures) return 'command line'
	if (options.sidecar) return `sidecar ${options.sidecar}`
	return `EXIF (base ISO ${options.baseIso})`
}

function createMetadata(inputs: readonly string[], options: CliOptions): MetadataProvider {
	if (options.exposures) {
		return inlineMetadata(inputs, options.exposures, options.gains)
	}
	if (options.sidecar) {
		return createSidecarMetadataProvider(loadSidecar(options.sidecar), { baseIso: options.baseIso })
	}
	return createExifMetadataProvider({ readSource, baseIso: options.baseIso })
}

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function progressLogger(options: CliOptions): (progress: MergeProgress) => void {
	const started = Date.now()
	const elapsed = () => `${Date.now() - started} ms`

	return (progress) => {
		if (!options.verbose || options.quiet) return

		switch (progress.stage) {
			case 'metadata':
				progress.identifiers.forEach((identifier, index) => {
					const exposure = progress.exposures[index]
					const gain = progress.gains[index]
					console.log(`  ${basename(identifier)}: exposure ${exposure} s, gain ${gain}`)
				})
				break
			case 'decoded':
				console.log(`Decoded ${progress.identifiers.length} images (${progress.width} x ${progress.height}) [${elapsed()}]`)
				break
			case 'scaled':
				console.log(`Scaled ${progress.images} radiance buffers [${elapsed()}]`)
				break
			case 'merged':
				console.log(`Merged [${elapsed()}]`)
				break
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function merge(inputs: readonly string[], options: CliOptions): Promise<number> {
	const output = resolve(options.out)

	if (existsSync(output) && !options.overwrite) {
		console.error(`Error: ${output} exists, use --overwrite`)
		return EXIT_ERROR
	}

	const metadata = createMetadata(inputs, options)

	if (options.dryRun) {
		console.log('\nDry run - would merge:\n')
		for (const input of inputs) {
			console.log(`  ${input}`)
		}
		console.log(`\n  metadata: ${describeSource(options)}`)
		console.log(`  → ${output}\n`)
		return EXIT_OK
	}

	if (!options.quiet) {
		console.log(`Merging ${inputs.length} images → ${basename(output)}`)
	}

	const merged = await calculatePoissonEstimate(
		inputs,
		{ metadata, decoder: createImageDecoder(readSource) },
		{ coefficients: options.coefficients, onProgress: progressLogger(options) }
	)

	const encoded = encodePfm(merged)
	mkdirSync(dirname(output), { recursive: true })
	writeFileSync(output, encoded)

	if (!options.quiet) {
		console.log(`Wrote ${output} (${merged.width} x ${merged.height}, ${formatBytes(encoded.length)})`)
	}
	return EXIT_OK
}

/**
 * Run hdrmerge with the given arguments, resolving to the exit code
 */
export async function run(args: readonly string[], env: Env = {}): Promise<number> {
	try {
		const { inputs: patterns, options: raw } = parseArgs(args)

		if (raw.help) {
			console.log(HELP)
			return EXIT_OK
		}

		if (raw.version) {
			console.log(`hdrmerge v${VERSION}`)
			return EXIT_OK
		}

		if (patterns.length === 0) {
			console.log(HELP)
			return EXIT_USAGE
		}

		const options = validateOptions(raw, env)

		const inputs: string[] = []
		for (const pattern of patterns) {
			const files = expandGlob(pattern)
			if (files.length === 0) {
				throw new UsageError(`No files matched: ${pattern}`)
			}
			inputs.push(...files)
		}

		return await merge(inputs, options)
	} catch (err) {
		if (err instanceof UsageError) {
			console.error(`Error: ${err.message}`)
			console.error('Run hdrmerge --help for usage')
			return EXIT_USAGE
		}

		const error = toHdrMergeError(err)
		console.error(`${error.kind} error: ${error.message}`)
		return EXIT_ERROR
	}
}
