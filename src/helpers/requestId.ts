import { customAlphabet } from 'nanoid'

/** Correlation id attached to every log line of one request, e.g. "k3v9q0x1m2ab" */
export const generateRequestId = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 12)
