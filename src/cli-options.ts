import { RoutingResult } from './types'
import { RoutingError } from './errors'

export interface CLIOptions {
  inputFile?: string
  outputPath?: string
  visualize: boolean
  quiet: boolean
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = { visualize: false, quiet: false }

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--input' && args[i + 1]) {
      options.inputFile = args[++i]
    } else if (args[i] === '--output' && args[i + 1]) {
      options.outputPath = args[++i]
      options.visualize = true
    } else if (args[i] === '--visualize') {
      options.visualize = true
    } else if (args[i] === '--quiet') {
      options.quiet = true
    }
  }

  return options
}

/** Result reported when the run fails before any route is attempted. */
export function systemFailure(error: unknown): RoutingResult {
  return {
    success: false,
    routes: [],
    failedRoutes: [{
      route: 'SYSTEM',
      start: 'N/A',
      end: 'N/A',
      reason: error instanceof Error ? error.message : String(error),
      code: error instanceof RoutingError ? error.code : 'INTERNAL'
    }]
  }
}
