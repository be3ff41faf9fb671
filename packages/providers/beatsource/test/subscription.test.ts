import { describe, expect, it } from 'vitest';

import { Codec, QualityTier } from '@app/contracts';

import {
  UNVALIDATED,
  classifySubscription,
  resolveCodec,
  resolveUpstreamQuality,
} from '../src/subscription.ts';

const pro = classifySubscription('bp_link_pro');
const standard = classifySubscription('bp_basic');

describe('classifySubscription', () => {
  it('recognises professional plans', () => {
    expect(pro).toEqual({ kind: 'pro', subscription: 'bp_link_pro' });
    expect(classifySubscription(' BP_LINK_PRO ').kind).toBe('pro');
    expect(classifySubscription('link_professional').kind).toBe('pro');
  });

  it('treats everything else as standard', () => {
    expect(standard).toEqual({ kind: 'standard', subscription: 'bp_basic' });
  });
});

describe('resolveUpstreamQuality', () => {
  it('always asks for medium before validation and on standard plans', () => {
    for (const quality of [QualityTier.HIFI, QualityTier.LOSSLESS, QualityTier.HIGH, QualityTier.MINIMUM]) {
      expect(resolveUpstreamQuality(UNVALIDATED, quality)).toBe('medium');
      expect(resolveUpstreamQuality(standard, quality)).toBe('medium');
    }
  });

  it('maps pro requests', () => {
    expect(resolveUpstreamQuality(pro, QualityTier.HIFI)).toBe('lossless');
    expect(resolveUpstreamQuality(pro, QualityTier.LOSSLESS)).toBe('lossless');
    expect(resolveUpstreamQuality(pro, QualityTier.HIGH)).toBe('high');
    expect(resolveUpstreamQuality(pro, QualityTier.MEDIUM)).toBe('medium');
    expect(resolveUpstreamQuality(pro, QualityTier.LOW)).toBe('medium');
  });
});

describe('resolveCodec', () => {
  it('reports FLAC for lossless requests', () => {
    expect(resolveCodec(QualityTier.LOSSLESS, standard)).toEqual({
      codec: Codec.FLAC,
      bitrate: 1411,
      bitDepth: 16,
      sampleRate: 44.1,
    });
  });

  it('reports 256k AAC only when high quality is granted', () => {
    expect(resolveCodec(QualityTier.HIGH, pro).bitrate).toBe(256);
    expect(resolveCodec(QualityTier.HIGH, standard).bitrate).toBe(128);
    expect(resolveCodec(QualityTier.MEDIUM, pro)).toEqual({
      codec: Codec.AAC,
      bitrate: 128,
      bitDepth: null,
      sampleRate: 44.1,
    });
  });
});
