import { z } from 'zod'
import { readFile } from 'node:fs/promises'
import { homedir } from 'os'
import { join } from 'path'
import { scenarioOverridesSchema } from './scenario.ts'

const configSchema = z.object({
  // pricing plan key used when none is given on the command line
  plan: z.string().optional(),
  scenario: scenarioOverridesSchema.optional().default({}),
  // extra pricing plans, validated against the same schema as the bundled ones
  plans: z.array(z.unknown()).optional().default([]),
})

export type Config = z.infer<typeof configSchema>

const DEFAULT_CONFIG: Config = {
  scenario: {},
  plans: [],
}

export function getConfigPath(): string {
  return process.env.CONTEXT_COST_CONFIG ?? join(homedir(), '.context-cost', 'config.json')
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load user configuration. A missing file means defaults; a broken one is
 * reported and ignored.
 */
export async function loadConfig(configPath = getConfigPath()): Promise<Config> {
  let text: string
  try {
    text = await readFile(configPath, 'utf8')
  } catch (err) {
    if (!isMissingFile(err)) {
      console.error(`failed to read config ${configPath}, using defaults:`, err instanceof Error ? err.message : err)
    }
    return structuredClone(DEFAULT_CONFIG)
  }

  try {
    return configSchema.parse(JSON.parse(text))
  } catch (err) {
    console.error(`failed to parse config ${configPath}, using defaults:`, err instanceof Error ? err.message : err)
    return structuredClone(DEFAULT_CONFIG)
  }
}
