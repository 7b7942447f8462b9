import * as readline from 'readline'
import { NotConfirmedError } from './errors.js'

/**
 * Presents a message and resolves only if the operator answers with
 * exactly `approval`.
 */
export type Confirmer = (message: string, approval: string) => Promise<void>

export interface ConfirmStreams {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

/**
 * Asks for confirmation on the terminal. Closed input counts as a refusal.
 */
export async function confirm(
  message: string,
  approval: string,
  streams: ConfirmStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    terminal: false
  })

  try {
    const answer = await new Promise<string>((resolve) => {
      rl.once('close', () => resolve(''))
      rl.question(
        `${message}\nPlease type '${approval}' to confirm: `,
        resolve
      )
    })
    if (answer !== approval) {
      throw new NotConfirmedError(approval)
    }
  } finally {
    rl.close()
  }
}
