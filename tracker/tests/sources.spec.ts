import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createFileSource } from '../watcher/src/sources'

describe('createFileSource', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'score-tracker-source-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  function sourceIn(directory: string) {
    return createFileSource({
      scoreStorePath: path.join(directory, 'scoredata.bin'),
      songCachePath: path.join(directory, 'songcache.bin'),
    })
  }

  it('reads the score store and song cache bytes', async () => {
    await writeFile(path.join(dir, 'scoredata.bin'), Uint8Array.from([1, 2, 3]))
    await writeFile(path.join(dir, 'songcache.bin'), Uint8Array.from([4, 5]))
    const source = sourceIn(dir)

    expect([...(await source.readScoreStore())]).toEqual([1, 2, 3])
    expect([...((await source.readSongCache()) ?? [])]).toEqual([4, 5])
  })

  it('fails the score store read when the file is missing', async () => {
    await expect(sourceIn(dir).readScoreStore()).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('treats a missing song cache as absent', async () => {
    await expect(sourceIn(dir).readSongCache()).resolves.toBeUndefined()
  })

  it('reads song.ini as text and treats a missing one as absent', async () => {
    const iniPath = path.join(dir, 'song.ini')
    await writeFile(iniPath, '[song]\nname = Limelight\n')
    const source = sourceIn(dir)

    await expect(source.readSongIni?.(iniPath)).resolves.toBe('[song]\nname = Limelight\n')
    await expect(source.readSongIni?.(path.join(dir, 'missing', 'song.ini'))).resolves.toBeUndefined()
  })

  it('surfaces read errors other than a missing file', async () => {
    const source = createFileSource({ scoreStorePath: dir, songCachePath: dir })

    await expect(source.readSongCache()).rejects.toMatchObject({ code: 'EISDIR' })
  })
})
