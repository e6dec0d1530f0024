/**
 * Audio upload payloads
 *
 * Layout: a 64-byte header followed by the file bytes.
 *   [0]      format (0 = wav, 1 = mp3)
 *   [1]      volume
 *   [4..8)   data length, little-endian
 *   [8..12)  chunk index, little-endian (always 0: files go up in one piece)
 *   [32..64) file name, at most 32 characters
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { InvalidSoundFileError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const AUDIO_HEADER_BYTES = 64;
export const SOUND_SIZE_MAX_BYTES = 255 * 1024;
const FILENAME_OFFSET = 32;
const FILENAME_MAX_CHARS = 32;

export type AudioFormat = 'wav' | 'mp3';

const FORMAT_CODE: Record<AudioFormat, number> = { wav: 0, mp3: 1 };

export interface AudioUpload {
  format: AudioFormat;
  volume: number;
  filename: string;
  data: Buffer;
}

export function formatFromName(filename: string): AudioFormat {
  const extension = path.extname(filename);
  if (extension === '.wav') return 'wav';
  if (extension === '.mp3') return 'mp3';
  throw new InvalidSoundFileError(`extension is ${extension || '(none)'}; expected extension to be wav or mp3`);
}

/** Throws InvalidSoundFileError unless `data` looks like a WAVE file with at most two channels. */
export function checkWave(filename: string, data: Buffer): void {
  if (data.length < 24 || data.toString('latin1', 0, 4) !== 'RIFF' || data.toString('latin1', 8, 12) !== 'WAVE') {
    throw new InvalidSoundFileError('file extension was .wav but does not appear to actually be a WAVE file');
  }
  const channels = data.readUInt16LE(22);
  if (channels > 2) {
    throw new InvalidSoundFileError(`only mono or stereo is supported, detected ${channels} channels.`);
  }
  if (channels === 2) {
    logger.warn('Audio', `${filename} is stereo; mono is recommended`);
  }
}

export function buildAudioPayload(upload: AudioUpload): Buffer {
  const header = Buffer.alloc(AUDIO_HEADER_BYTES);
  header.writeUInt8(FORMAT_CODE[upload.format], 0);
  header.writeUInt8(Math.max(0, Math.min(100, Math.round(upload.volume))), 1);
  header.writeUInt32LE(upload.data.length, 4);
  header.writeUInt32LE(0, 8);
  header.write(upload.filename.slice(0, FILENAME_MAX_CHARS), FILENAME_OFFSET, FILENAME_MAX_CHARS, 'latin1');
  return Buffer.concat([header, upload.data]);
}

/** Validate and encode an in-memory sound file. */
export function encodeSoundFile(filename: string, data: Buffer, volume: number): Buffer {
  if (data.length > SOUND_SIZE_MAX_BYTES) {
    throw new InvalidSoundFileError(
      `file size of ${data.length} bytes is too big; max size allowed is ${SOUND_SIZE_MAX_BYTES} bytes (${(SOUND_SIZE_MAX_BYTES / 1024).toFixed(1)} kB)`,
    );
  }
  const format = formatFromName(filename);
  if (format === 'wav') checkWave(filename, data);
  return buildAudioPayload({ format, volume, filename, data });
}

/** Read a local .wav or .mp3 file and encode it for upload. */
export async function loadSoundFile(filepath: string, volume: number): Promise<Buffer> {
  const stat = await fs.stat(filepath).catch((err: unknown) => {
    throw new InvalidSoundFileError(`file ${filepath} was not found`, { cause: err });
  });
  if (stat.size > SOUND_SIZE_MAX_BYTES) {
    throw new InvalidSoundFileError(
      `file size of ${stat.size} bytes is too big; max size allowed is ${SOUND_SIZE_MAX_BYTES} bytes (${(SOUND_SIZE_MAX_BYTES / 1024).toFixed(1)} kB)`,
    );
  }
  const filename = path.basename(filepath);
  formatFromName(filename);
  const data = await fs.readFile(filepath);
  return encodeSoundFile(filename, data, volume);
}
