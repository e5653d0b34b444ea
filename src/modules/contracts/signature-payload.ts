import { ValidationError } from '../../utils/errors';

const DATA_URL = /^data:image\/(png|jpeg|jpg|gif|webp);base64,([A-Za-z0-9+/=\s]+)$/;
const BASE64 = /^[A-Za-z0-9+/=\s]+$/;

export interface DecodedSignature {
  bytes: Buffer;
  extension: string;
}

/**
 * Decode a signature sent as a data URL or as bare base64 (assumed PNG).
 * An empty string means "no new signature".
 */
export function decodeSignature(text: string | undefined): DecodedSignature | undefined {
  const trimmed = text?.trim();
  if (!trimmed) return undefined;

  const dataUrl = DATA_URL.exec(trimmed);
  if (dataUrl) {
    const extension = dataUrl[1] === 'jpeg' ? 'jpg' : dataUrl[1];
    return { bytes: Buffer.from(dataUrl[2], 'base64'), extension };
  }
  if (BASE64.test(trimmed)) {
    return { bytes: Buffer.from(trimmed, 'base64'), extension: 'png' };
  }
  throw new ValidationError('signature must be a base64-encoded image or data URL');
}

/** Extension of an uploaded file name, lower-cased, without the dot. */
export function extensionOf(fileName: string | undefined): string {
  const match = /\.([A-Za-z0-9]{1,5})$/.exec(fileName ?? '');
  return match ? match[1].toLowerCase() : 'png';
}
