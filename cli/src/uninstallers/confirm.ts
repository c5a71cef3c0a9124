import { ConfirmPrompt, isCancel } from '@clack/core'
import type { ConfirmationProvider, Logger } from './types.js'

export class UninstallCancelledError extends Error {
  constructor() {
    super('Uninstall cancelled by user')
    this.name = 'UninstallCancelledError'
  }
}

const ENTER_KEYS = new Set(['\r', '\n'])
// Ctrl-C; clack turns it into a cancel after the key event.
const INTERRUPT = '\x03'

/**
 * Only the first character of a reply counts. Empty, "y" and "Y" mean yes;
 * anything else means no.
 */
export function isAffirmative(reply: string): boolean {
  const key = reply.charAt(0)
  return key === '' || key === 'y' || key === 'Y'
}

/**
 * Answer forced by a single keypress in the terminal prompt, or undefined
 * when clack already handles the key itself (y, n, enter, Ctrl-C).
 */
export function forcedAnswer(key: string): false | undefined {
  const lower = key.toLowerCase()
  if (lower === 'y' || lower === 'n' || ENTER_KEYS.has(key) || key === INTERRUPT) return undefined
  return false
}

export function createClackConfirm(): ConfirmationProvider {
  return {
    async ask(question) {
      const prompt = new ConfirmPrompt({
        active: 'Yes',
        inactive: 'No',
        initialValue: true,
        render() {
          const choice = this.value ? '● Yes / ○ No' : '○ Yes / ● No'
          switch (this.state) {
            case 'submit':
              return `${question}\n  ${this.value ? 'Yes' : 'No'}`
            case 'cancel':
              return `${question}\n  Cancelled`
            default:
              return `${question}\n  ${choice}`
          }
        }
      })
      // Registered before prompt() so it runs ahead of clack's own submit check.
      prompt.on('key', (key: string) => {
        if (forcedAnswer(key) === false) {
          prompt.value = false
          prompt.state = 'submit'
        }
      })
      const response: unknown = await prompt.prompt()
      if (isCancel(response)) throw new UninstallCancelledError()
      return response === true
    }
  }
}

/**
 * Piped stdin: each question consumes exactly one character. A newline
 * answers as enter, any other character answers by itself, and running out
 * of input answers no.
 */
export function createKeystrokeConfirm(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): ConfirmationProvider {
  const keys: string[] = []
  const waiting: Array<(key: string | undefined) => void> = []
  let attached = false
  let ended = false

  const onData = (chunk: string) => {
    for (const ch of chunk) {
      const next = waiting.shift()
      if (next) next(ch)
      else keys.push(ch)
    }
    if (waiting.length === 0) input.pause()
  }
  const onEnd = () => {
    ended = true
    for (const next of waiting.splice(0)) next(undefined)
  }

  const nextKey = async (): Promise<string | undefined> => {
    if (!attached) {
      attached = true
      input.setEncoding('utf8')
      input.on('data', onData)
      input.on('end', onEnd)
    }
    const buffered = keys.shift()
    if (buffered !== undefined) return buffered
    if (ended) return undefined
    return new Promise((resolve) => {
      waiting.push(resolve)
      input.resume()
    })
  }

  return {
    async ask(question) {
      output.write(`${question} [Y/n] `)
      const key = await nextKey()
      if (key === undefined) {
        output.write('\n')
        return false
      }
      const enter = ENTER_KEYS.has(key)
      output.write(enter ? '\n' : `${key}\n`)
      return isAffirmative(enter ? '' : key)
    },
    close() {
      if (!attached) return
      input.removeListener('data', onData)
      input.removeListener('end', onEnd)
      input.pause()
    }
  }
}

export function createFixedConfirm(answer: boolean, logger: Logger, reason: string): ConfirmationProvider {
  return {
    async ask(question) {
      logger.info(`${question} ${answer ? 'yes' : 'no'} (${reason})`)
      return answer
    }
  }
}
