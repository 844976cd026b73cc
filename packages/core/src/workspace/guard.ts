import os from 'node:os'
import path from 'node:path'
import { PathEscapeError } from '../errors.js'

function expandHome(input: string): string {
  if (input === '~') return os.homedir()
  if (input.startsWith('~/') || input.startsWith(`~${path.sep}`)) return path.join(os.homedir(), input.slice(2))
  return input
}

export function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate)
  if (rel === '') return true
  if (path.isAbsolute(rel)) return false
  return rel !== '..' && !rel.startsWith(`..${path.sep}`)
}

/**
 * Keeps user-supplied paths inside a fixed sandbox root.
 *
 * Paths are normalised lexically; symbolic links are not followed, so a link
 * inside the root that points elsewhere still passes.
 */
export class WorkspaceGuard {
  readonly root: string

  constructor(root: string) {
    this.root = path.resolve(root)
  }

  resolve(pathInput: string): string {
    if (pathInput.includes('\0')) throw new PathEscapeError(pathInput, this.root)
    const resolved = path.resolve(this.root, expandHome(pathInput))
    if (!isInside(this.root, resolved)) throw new PathEscapeError(pathInput, this.root)
    return resolved
  }

  relative(absolutePath: string): string {
    return path.relative(this.root, this.resolve(absolutePath))
  }
}
