type SplitLogArgs = {
  text: string
  fields?: Record<string, unknown>
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error)

const stringify = (value: unknown): string => {
  if (typeof value === 'string') {
    return value
  }

  if (value instanceof Error) {
    return value.message
  }

  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value)
  }

  return String(value)
}

/**
 * Turns the loose argument list of a log call into pino's `(fields, text)`.
 *
 * A single trailing plain object or Error becomes the merge object, every
 * other argument is joined into the message.
 */
export function splitLogArgs(message: unknown, args: unknown[]): SplitLogArgs {
  if (args.length === 0) {
    return { text: stringify(message) }
  }

  const last = args[args.length - 1]
  const rest = args.slice(0, -1)
  const head = [message, ...rest].map(stringify).join(' ')

  if (last instanceof Error) {
    return { text: head, fields: { err: last } }
  }

  if (isPlainObject(last)) {
    return { text: head, fields: last }
  }

  return { text: [head, stringify(last)].join(' ') }
}

export type { SplitLogArgs }
