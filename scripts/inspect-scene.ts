#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { loggers } from '@hierarchy/logger'
import { inspectNode, inspectQuerySchema, loadScene } from '@hierarchy/scene'
import { pathOf, resolvePath } from '@hierarchy/search'

const log = loggers.cli.withTag('inspect-scene')

const [sceneFile, nodePath, ...pairs] = process.argv.slice(2)

if (!sceneFile || !nodePath) {
	throw new Error(
		'Usage: tsx scripts/inspect-scene.ts <scene.json> <node-path> [key=value ...]'
	)
}

const query = inspectQuerySchema.strict().parse(
	Object.fromEntries(
		pairs.map((pair): [string, string] => {
			const separator = pair.indexOf('=')
			return separator === -1
				? [pair, '']
				: [pair.slice(0, separator), pair.slice(separator + 1)]
		})
	)
)

const scenePath = resolve(process.cwd(), sceneFile)
const json: unknown = JSON.parse(readFileSync(scenePath, 'utf8'))
const { root } = loadScene(json)

const node = resolvePath(root, nodePath)
if (!node) {
	throw new Error(`No node at "${nodePath}" in ${scenePath}`)
}

log.start(`Inspecting ${pathOf(node)}`)
const entries = inspectNode(node, query)
log.success(`${entries.length} matches`)
