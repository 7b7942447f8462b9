import * as yaml from 'js-yaml'
import { createTwoFilesPatch, parsePatch, ParsedDiff } from 'diff'
import { DIFF } from './constants.js'
import { ResourceChange } from './types.js'

const LIVE_PREFIX = 'live/'
const MERGED_PREFIX = 'merged/'

/**
 * One object to compare. `live` is null when the object does not exist in
 * the cluster yet.
 */
export interface DiffEntry {
  key: string
  live: unknown
  merged: unknown
}

function dump(value: unknown): string {
  if (value === null || value === undefined) {
    return ''
  }
  return yaml.dump(value, { sortKeys: true })
}

/**
 * Renders the live and merged state of each entry as key-sorted YAML and
 * concatenates the unified diffs of the entries that differ.
 *
 * @returns The diff, or null when no entry differs
 */
export function renderDiff(entries: DiffEntry[]): string | null {
  const patches: string[] = []

  for (const { key, live, merged } of entries) {
    const liveYaml = dump(live)
    const mergedYaml = dump(merged)
    if (liveYaml === mergedYaml) {
      continue
    }
    patches.push(
      createTwoFilesPatch(
        `${LIVE_PREFIX}${key}`,
        `${MERGED_PREFIX}${key}`,
        liveYaml,
        mergedYaml
      )
    )
  }

  return patches.length > 0 ? patches.join('') : null
}

function objectKey(file: ParsedDiff): string {
  const name = file.newFileName ?? file.oldFileName ?? ''
  for (const prefix of [MERGED_PREFIX, LIVE_PREFIX]) {
    if (name.startsWith(prefix)) {
      return name.slice(prefix.length)
    }
  }
  return name
}

function changedFiles(text: string): ParsedDiff[] {
  return parsePatch(text).filter((file) => file.hunks.length > 0)
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`
}

/**
 * Summarizes a unified diff as a histogram of inserted and deleted lines
 * per object, in the manner of `diffstat(1)`.
 */
export function diffstat(text: string): string {
  const stats = changedFiles(text).map((file) => {
    const lines = file.hunks.flatMap((hunk) => hunk.lines)
    return {
      name: objectKey(file),
      insertions: lines.filter((line) => line.startsWith('+')).length,
      deletions: lines.filter((line) => line.startsWith('-')).length
    }
  })

  const nameWidth = Math.max(0, ...stats.map((s) => s.name.length))
  const totals = stats.map((s) => s.insertions + s.deletions)
  const countWidth = Math.max(0, ...totals.map((t) => String(t).length))
  const widest = Math.max(0, ...totals)
  const scale =
    widest > DIFF.MAX_HISTOGRAM_WIDTH ? DIFF.MAX_HISTOGRAM_WIDTH / widest : 1
  const bar = (count: number): number =>
    count > 0 ? Math.max(1, Math.round(count * scale)) : 0

  const lines = stats.map((s, i) => {
    const histogram =
      '+'.repeat(bar(s.insertions)) + '-'.repeat(bar(s.deletions))
    return ` ${s.name.padEnd(nameWidth)} | ${String(totals[i]).padStart(countWidth)} ${histogram}`.trimEnd()
  })

  const insertions = stats.reduce((sum, s) => sum + s.insertions, 0)
  const deletions = stats.reduce((sum, s) => sum + s.deletions, 0)
  lines.push(
    ` ${plural(stats.length, 'file')} changed, ${plural(insertions, 'insertion')}(+), ${plural(deletions, 'deletion')}(-)`
  )

  return `${lines.join('\n')}\n`
}

/**
 * Splits a multi-object diff into one change record per object.
 */
export function changesFromDiff(text: string): ResourceChange[] {
  return changedFiles(text).map(
    (file): ResourceChange => ({
      objectKey: objectKey(file),
      status: file.hunks.every((hunk) => hunk.oldLines === 0)
        ? 'created'
        : 'modified',
      diff: file.hunks
        .map((hunk) =>
          [
            `@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`,
            ...hunk.lines
          ].join('\n')
        )
        .join('\n')
    })
  )
}
