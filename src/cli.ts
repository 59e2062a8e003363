#!/usr/bin/env node
/**
 * Command-line router.
 *
 * Usage:
 *   node dist/cli.js < design.json
 *   node dist/cli.js --input design.json --output ./out/chip
 *
 * Input: JSON DesignInput on stdin or via --input file
 * Output: JSON RoutingResult on stdout; progress on stderr
 */

import * as fs from 'fs'
import * as path from 'path'
import { DesignInput } from './types'
import { Router } from './router'
import { Visualizer } from './visualizer'
import { OutputGenerator } from './output'
import { CLIOptions, parseArgs, systemFailure } from './cli-options'
import { setLogLevel } from './log'

async function readInput(options: CLIOptions): Promise<DesignInput> {
  let jsonStr: string

  if (options.inputFile) {
    jsonStr = fs.readFileSync(options.inputFile, 'utf-8')
  } else {
    jsonStr = await new Promise<string>((resolve, reject) => {
      let data = ''
      process.stdin.setEncoding('utf-8')
      process.stdin.on('data', chunk => data += chunk)
      process.stdin.on('end', () => resolve(data))
      process.stdin.on('error', reject)
    })
  }

  return JSON.parse(jsonStr) as DesignInput
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2))
  if (options.quiet) setLogLevel('silent')

  try {
    const input = await readInput(options)
    const router = new Router(input)
    const result = router.route()

    if (options.visualize && options.outputPath) {
      const outputDir = path.dirname(options.outputPath)
      if (outputDir && outputDir !== '.') {
        fs.mkdirSync(outputDir, { recursive: true })
      }

      const design = router.getDesign()
      await new Visualizer(design).saveToFile(`${options.outputPath}_debug.png`)
      if (result.success) {
        await new OutputGenerator(design).saveToFiles(options.outputPath)
      }
    }

    console.log(JSON.stringify(result, null, 2))
    if (!result.success) process.exitCode = 1
  } catch (error) {
    console.log(JSON.stringify(systemFailure(error), null, 2))
    process.exitCode = 1
  }
}

void main()
