export interface PathDerivedTitle {
  title: string
  artist?: string
}

const ARCHIVE_EXTENSION = '.sng'
const CHART_FILE_EXTENSIONS = ['.chart', '.mid', '.ini']
const ARTIST_SEPARATOR = ' - '

export function splitPath(filepath: string): string[] {
  return filepath.split(/[\\/]+/).filter((segment) => segment.trim().length > 0)
}

function hasExtension(segment: string, extension: string): boolean {
  return segment.toLowerCase().endsWith(extension)
}

/**
 * Pick the segment that names the song: the archive name for .sng files, the
 * parent folder for loose chart files, the last folder otherwise.
 */
function songSegment(segments: string[]): string | undefined {
  const last = segments[segments.length - 1]
  if (!last) return undefined

  if (hasExtension(last, ARCHIVE_EXTENSION)) {
    return last.slice(0, -ARCHIVE_EXTENSION.length)
  }
  const candidate = CHART_FILE_EXTENSIONS.some((ext) => hasExtension(last, ext))
    ? segments[segments.length - 2]
    : last
  return candidate && !isDriveRoot(candidate) ? candidate : undefined
}

// "C:" names a volume, never a song
function isDriveRoot(segment: string): boolean {
  return segment.trim().endsWith(':')
}

function isPlausibleArtist(artist: string): boolean {
  return artist.length >= 2 && !/^\d+$/.test(artist)
}

/**
 * Derive title (and artist when the folder follows "Artist - Title") from a
 * song's path. Case is kept as stored.
 */
export function deriveTitleFromPath(filepath: string): PathDerivedTitle | undefined {
  const segment = songSegment(splitPath(filepath))?.trim()
  if (!segment) return undefined

  const separatorAt = segment.indexOf(ARTIST_SEPARATOR)
  if (separatorAt === -1) {
    return { title: segment }
  }

  const artist = segment.slice(0, separatorAt).trim()
  const title = segment.slice(separatorAt + ARTIST_SEPARATOR.length).trim()
  return isPlausibleArtist(artist) ? { title, artist } : { title }
}
