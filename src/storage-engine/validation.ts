import { InvalidArgumentError } from './errors'

const lineTerminator = /[\r\n]/
const whitespace = /\s/

/**
 * Check that a key/value pair fits in one log record.
 * Throws InvalidArgumentError for empty input, embedded line breaks,
 * whitespace anywhere in the key, or whitespace around the value.
 *
 * Whitespace inside a value is accepted here even though replay will
 * skip such a record; the format has no quoting.
 */
export function validateEntry(key: string, value: string): void {
  validateField('key', key)
  if (whitespace.test(key)) {
    throw new InvalidArgumentError(
      'key',
      'Invalid key: must not contain whitespace'
    )
  }

  validateField('value', value)
  if (value !== value.trim()) {
    throw new InvalidArgumentError(
      'value',
      'Invalid value: must not start or end with whitespace'
    )
  }
}

function validateField(field: 'key' | 'value', text: string): void {
  if (text.length === 0) {
    throw new InvalidArgumentError(field, `Invalid ${field}: must not be empty`)
  }
  if (lineTerminator.test(text)) {
    throw new InvalidArgumentError(
      field,
      `Invalid ${field}: must not contain a line break`
    )
  }
}
