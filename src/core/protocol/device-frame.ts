import type { Category } from '@shared/types'

// @DEV-GUIDE: Byte protocol understood by the sorting microcontroller.
// Classification frame (4 bytes): [PREFIX 0xAA, COMMAND 0x01, CODE, CODE ^ COMMAND]
// Category codes: Paper 0x01, Glass 0x02, Metal 0x03, Plastic 0x04, Trash 0x05,
// anything unrecognized 0xFF. Text messages are raw UTF-8 terminated by '\n'.

export const FRAME_PREFIX = 0xaa
export const COMMAND_CLASSIFICATION_RESULT = 0x01
export const FRAME_LENGTH = 4

export const CATEGORY_UNKNOWN_CODE = 0xff

export const CATEGORY_CODES: Readonly<Record<Category, number>> = {
  Paper: 0x01,
  Glass: 0x02,
  Metal: 0x03,
  Plastic: 0x04,
  Trash: 0x05,
  Unknown: CATEGORY_UNKNOWN_CODE,
}

const CODES_BY_LOWERCASE_LABEL = new Map<string, number>(
  Object.entries(CATEGORY_CODES).map(([label, code]) => [label.toLowerCase(), code]),
)

/** Case-insensitive; null and unmatched labels map to 0xFF. */
export function categoryCodeFor(label: string | null): number {
  if (label === null) return CATEGORY_UNKNOWN_CODE
  return CODES_BY_LOWERCASE_LABEL.get(label.toLowerCase()) ?? CATEGORY_UNKNOWN_CODE
}

export function frameChecksum(command: number, code: number): number {
  return (command ^ code) & 0xff
}

export function encodeClassificationFrame(category: Category): Uint8Array {
  const code = CATEGORY_CODES[category]
  return Uint8Array.of(
    FRAME_PREFIX,
    COMMAND_CLASSIFICATION_RESULT,
    code,
    frameChecksum(COMMAND_CLASSIFICATION_RESULT, code),
  )
}

/**
 * Returns the category code carried by a classification frame, or null when the bytes
 * are not a well-formed frame (length, prefix, command or checksum mismatch).
 */
export function decodeClassificationFrame(bytes: Uint8Array): number | null {
  if (bytes.length !== FRAME_LENGTH) return null
  const [prefix, command, code, checksum] = bytes
  if (prefix !== FRAME_PREFIX || command !== COMMAND_CLASSIFICATION_RESULT) return null
  if (checksum !== frameChecksum(command, code)) return null
  return code
}

export function encodeTextMessage(message: string): Uint8Array {
  return new TextEncoder().encode(`${message}\n`)
}
