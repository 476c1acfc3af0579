import { DecodingError } from '../errors.js';

/**
 * Strictly decode file bytes. Malformed input and unknown encoding labels
 * surface as DecodingError rather than replacement characters.
 */
export function decodeText(bytes: Uint8Array, encoding = 'utf-8', source?: string): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (err) {
    throw new DecodingError(`Unsupported encoding "${encoding}"`, { encoding, source }, err);
  }

  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new DecodingError(
      `${source ?? 'Input'} is not valid ${decoder.encoding}`,
      { encoding: decoder.encoding, source },
      err,
    );
  }
}
