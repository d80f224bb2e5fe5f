import {access} from 'node:fs/promises'

export const gib = 1024 * 1024 * 1024

/** Progress line shown before each step runs. */
export function formatProgress(current: number, total: number, label: string): string {
  return `Step ${current}/${total}: ${label}`
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`
  }

  if (bytes < gib) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  }

  return `${(bytes / gib).toFixed(1)} GB`
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/** UTC timestamp with second granularity, e.g. `20261019T055012Z`. */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replaceAll(/[-:]/g, '').replace(/\.\d+Z$/, 'Z')
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/** Quotes a value for a POSIX shell, leaving plain words untouched. */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value
  }

  return `'${value.replaceAll('\'', '\'\\\'\'')}'`
}
