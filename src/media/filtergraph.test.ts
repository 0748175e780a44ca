import { buildFilterGraph, buildRenderArgs, bufferSizeFor, joinFilter, segmentFilter } from './filtergraph.js';
import { buildVideoPlan } from './plan.js';
import { buildTimeline } from '../pipeline/audio.js';
import type { AudioSegment } from '../pipeline/types.js';

function planFor(seconds: readonly number[], gapSeconds = 0.5) {
  const sampleRate = 1000;
  const clips: AudioSegment[] = seconds.map((s, ordinal) => ({
    ordinal,
    samples: new Int16Array(s * sampleRate),
    sampleRate,
    durationSeconds: s,
  }));
  const audio = buildTimeline(clips, { sampleRate, gapSeconds });
  return buildVideoPlan(audio, { width: 1920, height: 1080, fps: 30, crossfadeSeconds: 0.25 });
}

describe('segmentFilter', () => {
  it('cover-crops at double size and runs zoompan for the rendered frame count', () => {
    const plan = planFor([2, 2, 2]);
    const first = plan.segments[0];
    if (!first) throw new Error('missing segment');

    expect(segmentFilter(0, first, plan)).toBe(
      "[0:v]scale=3840:2160:force_original_aspect_ratio=increase,crop=3840:2160,setsar=1," +
      "zoompan=z='1.05+0.15*on/71':x='(iw-iw/zoom)*(0.2+0.6*on/71)':y='(ih-ih/zoom)*(0.5)':d=72:s=1920x1080:fps=30," +
      'format=yuv420p,setpts=PTS-STARTPTS[v0]',
    );
  });
});

describe('joinFilter', () => {
  it('chains xfades at the centred boundary offsets', () => {
    expect(joinFilter(planFor([2, 2, 2]))).toBe(
      '[v0][v1]xfade=transition=fade:duration=0.266667:offset=2.133333[x1];' +
      '[x1][v2]xfade=transition=fade:duration=0.266667:offset=4.633333[vout]',
    );
  });

  it('concatenates when there is no gap to fade across', () => {
    expect(joinFilter(planFor([2, 2, 2], 0))).toBe('[v0][v1][v2]concat=n=3:v=1:a=0[vout]');
  });

  it('passes a single segment straight through', () => {
    expect(joinFilter(planFor([2]))).toBe('[v0]null[vout]');
  });
});

describe('buildFilterGraph', () => {
  it('has one chain per segment plus the join', () => {
    const graph = buildFilterGraph(planFor([2, 2, 2]));
    const chains = graph.split(';\n');
    expect(chains).toHaveLength(4);
    expect(chains[3]).toBe(joinFilter(planFor([2, 2, 2])));
  });
});

describe('buildRenderArgs', () => {
  it('maps the filtered video and the narration input', () => {
    const args = buildRenderArgs({
      plan: planFor([2, 2, 2]),
      imagePaths: ['a.png', 'b.png', 'c.png'],
      audioPath: 'narration.wav',
      filterScriptPath: 'graph.txt',
      outputPath: 'out.mp4',
      bitrate: '5M',
    });

    expect(args.slice(0, 8)).toEqual(['-i', 'a.png', '-i', 'b.png', '-i', 'c.png', '-i', 'narration.wav']);
    expect(args[args.indexOf('-filter_complex_script') + 1]).toBe('graph.txt');
    expect(args[args.indexOf('-map') + 1]).toBe('[vout]');
    expect(args[args.lastIndexOf('-map') + 1]).toBe('3:a');
    expect(args[args.indexOf('-c:v') + 1]).toBe('libx264');
    expect(args[args.indexOf('-pix_fmt') + 1]).toBe('yuv420p');
    expect(args[args.indexOf('-bufsize') + 1]).toBe('10M');
    expect(args[args.indexOf('-movflags') + 1]).toBe('+faststart');
    expect(args[args.length - 1]).toBe('out.mp4');
  });
});

describe('bufferSizeFor', () => {
  it('doubles the bitrate and keeps the unit', () => {
    expect(bufferSizeFor('5M')).toBe('10M');
    expect(bufferSizeFor('800k')).toBe('1600k');
    expect(bufferSizeFor('fast')).toBe('fast');
  });
});
