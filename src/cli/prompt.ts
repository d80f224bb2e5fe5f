import process from 'node:process'
import {createInterface} from 'node:readline/promises'
import type {Confirmer} from '../core/decision.js'
import type {Reporter} from '../core/reporter.js'

/**
 * Reads a yes/no answer. An empty answer takes the default; anything that is
 * not y/yes/n/no (any case) is undefined, and the question is asked again.
 */
export function parseAnswer(raw: string, defaultAnswer: boolean): boolean | undefined {
  const answer = raw.trim().toLowerCase()
  if (answer === '') {
    return defaultAnswer
  }

  if (answer === 'y' || answer === 'yes') {
    return true
  }

  if (answer === 'n' || answer === 'no') {
    return false
  }

  return undefined
}

export function promptSuffix(defaultAnswer: boolean): string {
  return defaultAnswer ? '(Y/n)' : '(y/N)'
}

export type PrompterHooks = {
  /** Called before the question is written, e.g. to pause a spinner */
  onPrompt?: () => void;
  onAnswer?: () => void;
}

/**
 * Asks on the terminal and waits as long as it takes.
 */
export class ReadlinePrompter implements Confirmer {
  constructor(
    private readonly hooks: PrompterHooks = {},
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
    this.hooks.onPrompt?.()
    const rl = createInterface({input: this.input, output: this.output})
    try {
      for (;;) {
        const raw = await rl.question(`${question} ${promptSuffix(defaultAnswer)} `)
        const answer = parseAnswer(raw, defaultAnswer)
        if (answer !== undefined) {
          return answer
        }

        this.output.write('Please answer y or n.\n')
      }
    } finally {
      rl.close()
      this.hooks.onAnswer?.()
    }
  }
}

/**
 * Confirmer for unattended runs: every question takes its default answer,
 * and the choice is reported.
 */
export class DefaultsConfirmer implements Confirmer {
  constructor(private readonly reporter: Reporter) {}

  async confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
    this.reporter.emit({
      event: 'NOTICE',
      message: `${question} ${defaultAnswer ? 'yes' : 'no'} (non-interactive default)`
    })
    return defaultAnswer
  }
}
