import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'

export const ENV_FILES = ['.env.local', '.env'] as const

/**
 * Parse dotenv content. Comments and lines without `=` are ignored;
 * surrounding quotes are stripped.
 */
export function parseEnvContent(content: string): Record<string, string> {
  const env: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    const eqIdx = trimmed.indexOf('=')
    if (eqIdx === -1) continue
    const key = trimmed.slice(0, eqIdx).trim()
    const raw = trimmed.slice(eqIdx + 1).trim()
    env[key] = raw.replace(/^["'](.*)["']$/, '$1')
  }
  return env
}

/**
 * Load the first env file found in `dir`.
 */
export function loadPlaintextEnv(dir: string): Record<string, string> {
  for (const envFile of ENV_FILES) {
    const path = resolve(dir, envFile)
    if (existsSync(path)) {
      return parseEnvContent(readFileSync(path, 'utf8'))
    }
  }
  return {}
}

/**
 * Copy values into `target` without overriding what is already set.
 * Returns the keys that were applied.
 */
export function applyEnv(
  values: Record<string, string>,
  target: NodeJS.ProcessEnv = process.env
): string[] {
  const applied: string[] = []
  for (const [key, value] of Object.entries(values)) {
    if (target[key] === undefined) {
      target[key] = value
      applied.push(key)
    }
  }
  return applied
}
