import type {ResourcePolicy} from '../types.js'

export type ResourceAction = 'create' | 'reuse' | 'recreate'

/**
 * Asks the operator a yes/no question. Implementations block until an answer
 * is given; there is no timeout.
 */
export type Confirmer = {
  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;
}

/**
 * What to do with a resource that may already be on disk. A missing resource
 * is always created; an existing one is destroyed only on explicit request.
 */
export function decideResourceAction(exists: boolean, recreateRequested: boolean): ResourceAction {
  if (!exists) {
    return 'create'
  }

  return recreateRequested ? 'recreate' : 'reuse'
}

/**
 * Turns the run's resource policy into a recreate request. Only the `prompt`
 * policy talks to the operator, and the suggested answer is yes.
 */
export async function requestRecreate(policy: ResourcePolicy, confirmer: Confirmer, question: string): Promise<boolean> {
  switch (policy) {
    case 'recreate': {
      return true
    }

    case 'reuse': {
      return false
    }

    case 'prompt': {
      return confirmer.confirm(question, true)
    }
  }
}
