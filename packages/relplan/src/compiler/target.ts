import { UnsupportedOperationError } from '../errors'
import type { Backend } from '../pipeline/request'

export const TARGET_ALGEBRAS = ['myria-left-deep', 'myria-hypercube', 'clang', 'grappa'] as const

export type TargetAlgebra = (typeof TARGET_ALGEBRAS)[number]

/**
 * Target algebra for a backend. Pure lookup; no I/O.
 */
export function selectTargetAlgebra(backend: Backend, multiwayJoin: boolean): TargetAlgebra {
  switch (backend) {
    case 'clang':
      return 'clang'
    case 'grappa':
      return 'grappa'
    case 'myria':
      return multiwayJoin ? 'myria-hypercube' : 'myria-left-deep'
    default: {
      const unknown: never = backend
      throw new UnsupportedOperationError(`Backend ${String(unknown)} has no target algebra`)
    }
  }
}

export function isMyriaAlgebra(algebra: TargetAlgebra): boolean {
  return algebra === 'myria-left-deep' || algebra === 'myria-hypercube'
}
