import { concatSamples, encodeWav, pcm16FromBytes, silence, wavDurationSeconds } from './wav.js';

describe('encodeWav', () => {
  it('writes a 44-byte PCM header followed by little-endian samples', () => {
    const wav = encodeWav(new Int16Array([0, 1000, -1000]), 8000);

    expect(wav.length).toBe(50);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(42);
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(8000);
    expect(wav.readUInt32LE(28)).toBe(16_000);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.readUInt32LE(40)).toBe(6);
    expect(wav.readInt16LE(46)).toBe(1000);
    expect(wav.readInt16LE(48)).toBe(-1000);
  });

  it('round-trips the duration through the header', () => {
    expect(wavDurationSeconds(encodeWav(new Int16Array(36_000), 24_000))).toBe(1.5);
  });

  it('rejects buffers that are not WAV', () => {
    expect(() => wavDurationSeconds(Buffer.alloc(10))).toThrow('not a RIFF/WAVE buffer');
  });
});

describe('PCM helpers', () => {
  it('decodes signed 16-bit samples and drops a trailing odd byte', () => {
    expect(Array.from(pcm16FromBytes(Buffer.from([0x01, 0x00, 0xff, 0xff, 0x7f])))).toEqual([1, -1]);
  });

  it('sizes silence by rounding seconds × rate', () => {
    expect(silence(0.5, 24_000).length).toBe(12_000);
    expect(silence(0, 24_000).length).toBe(0);
  });

  it('concatenates in order', () => {
    const joined = concatSamples([new Int16Array([1, 2]), new Int16Array([]), new Int16Array([3])]);
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });
});
