import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { StateFileError } from '../shared/lib/errors'
import { migrateLegacyState, parseStateFile, serializeState } from '../shared/lib/state-file'
import { FileStateStore } from '../watcher/src/state-store'
import { chartHex, record } from './helpers/fixtures'

const K = `${chartHex(0xaa)}:0:3`

describe('parseStateFile', () => {
  it('reads the current format', () => {
    const text = JSON.stringify({ score_values: { [K]: 1200 }, last_updated: 1700000000.5 })
    expect(parseStateFile(text)).toEqual({ kind: 'current', scores: { [K]: 1200 }, lastUpdated: 1700000000.5 })
  })

  it('recognizes the legacy key list', () => {
    expect(parseStateFile(JSON.stringify({ known_scores: [K] }))).toEqual({ kind: 'legacy', keys: [K] })
  })

  it('treats a blank file as empty', () => {
    expect(parseStateFile('  \n')).toEqual({ kind: 'empty' })
  })

  it('rejects invalid JSON', () => {
    expect(() => parseStateFile('{"score_values":', '/tmp/state.json')).toThrow(
      new StateFileError('State file is not valid JSON'),
    )
  })

  it('rejects an unknown shape', () => {
    expect(() => parseStateFile(JSON.stringify({ score_values: { [K]: -1 } }))).toThrow(StateFileError)
    expect(() => parseStateFile('[]')).toThrow(StateFileError)
  })
})

describe('migrateLegacyState', () => {
  it('seeds scores from the current store keeping the highest per key', () => {
    const scores = migrateLegacyState([
      record({ score: 100 }),
      record({ score: 300 }),
      record({ score: 200 }),
      record({ chartId: chartHex(0xbb), instrumentId: 4, difficultyId: 1, score: 9 }),
    ])

    expect(scores).toEqual({ [K]: 300, [`${chartHex(0xbb)}:4:1`]: 9 })
  })
})

describe('serializeState', () => {
  it('writes score values and a seconds timestamp', () => {
    expect(serializeState({ [K]: 1 }, new Date(1700000000500))).toBe(
      `{\n  "score_values": {\n    "${K}": 1\n  },\n  "last_updated": 1700000000.5\n}\n`,
    )
  })
})

describe('FileStateStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'score-tracker-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('loads a missing file as empty', async () => {
    const store = new FileStateStore(path.join(dir, 'state.json'))
    await expect(store.load()).resolves.toEqual({ kind: 'empty' })
  })

  it('saves atomically and reads back what it wrote', async () => {
    const file = path.join(dir, 'nested', 'state.json')
    const store = new FileStateStore(file, () => new Date(1700000000000))

    await store.save({ [K]: 4242 })

    await expect(store.load()).resolves.toEqual({
      kind: 'current',
      scores: { [K]: 4242 },
      lastUpdated: 1700000000,
    })
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['state.json'])
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
      score_values: { [K]: 4242 },
      last_updated: 1700000000,
    })
  })

  it('surfaces a corrupt file as a state file error', async () => {
    const file = path.join(dir, 'state.json')
    await writeFile(file, 'not json', 'utf8')

    await expect(new FileStateStore(file).load()).rejects.toBeInstanceOf(StateFileError)
  })
})
