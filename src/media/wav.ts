/**
 * 16-bit mono PCM helpers: raw little-endian decoding, silence, concatenation
 * and RIFF/WAVE encoding for the narration track handed to ffmpeg.
 */

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;
const CHANNELS = 1;

/** Decode raw little-endian signed 16-bit PCM bytes. A trailing odd byte is dropped. */
export function pcm16FromBytes(bytes: Buffer): Int16Array {
  const out = new Int16Array(Math.floor(bytes.length / 2));
  for (let i = 0; i < out.length; i++) {
    out[i] = bytes.readInt16LE(i * 2);
  }
  return out;
}

export function silence(seconds: number, sampleRate: number): Int16Array {
  return new Int16Array(Math.round(seconds * sampleRate));
}

export function concatSamples(parts: readonly Int16Array[]): Int16Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const blockAlign = CHANNELS * (BITS_PER_SAMPLE / 8);
  const dataSize = samples.length * blockAlign;
  const buf = Buffer.alloc(HEADER_SIZE + dataSize);

  // RIFF header
  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(HEADER_SIZE + dataSize - 8, 4);
  buf.write('WAVE', 8, 'ascii');

  // fmt chunk
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(CHANNELS, 22);
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * blockAlign, 28);
  buf.writeUInt16LE(blockAlign, 32);
  buf.writeUInt16LE(BITS_PER_SAMPLE, 34);

  // data chunk
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataSize, 40);
  for (let i = 0; i < samples.length; i++) {
    buf.writeInt16LE(samples[i] ?? 0, HEADER_SIZE + i * 2);
  }
  return buf;
}

/** Duration of a WAV produced by encodeWav, read back from its header. */
export function wavDurationSeconds(wav: Buffer): number {
  if (wav.length < HEADER_SIZE || wav.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('wavDurationSeconds: not a RIFF/WAVE buffer');
  }
  const byteRate = wav.readUInt32LE(28);
  const dataSize = wav.readUInt32LE(40);
  return byteRate === 0 ? 0 : dataSize / byteRate;
}
