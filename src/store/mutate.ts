import { ConcurrencyError, NotFoundError } from '../utils/errors'
import type { VersionedRepository } from './types'

const MAX_SWAP_ATTEMPTS = 8

export interface SwapResult<T> {
  before: T
  after: T
}

/**
 * Read-modify-write through compare-and-swap.
 * `mutator` sees the latest snapshot and returns a patch, or null to abort without writing.
 * A lost swap re-reads and re-runs the mutator.
 */
export async function casUpdate<T extends { version: number }, P>(
  repo: VersionedRepository<T, P>,
  entity: string,
  id: string,
  mutator: (current: T) => P | null,
): Promise<SwapResult<T> | null> {
  for (let attempt = 0; attempt < MAX_SWAP_ATTEMPTS; attempt++) {
    const current = await repo.findById(id)
    if (!current) {
      throw new NotFoundError(`${entity} ${id} not found`)
    }

    const patch = mutator(current)
    if (patch === null) return null

    const after = await repo.compareAndSwap(id, current.version, patch)
    if (after) return { before: current, after }
  }

  throw new ConcurrencyError(entity, id)
}
