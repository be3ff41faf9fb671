import { Codec, QualityTier } from '@app/contracts';

import type { UpstreamQuality } from './beatsource.types.ts';

export type SubscriptionTier =
  | { kind: 'unvalidated' }
  | { kind: 'standard'; subscription: string }
  | { kind: 'pro'; subscription: string };

export const UNVALIDATED: SubscriptionTier = Object.freeze({ kind: 'unvalidated' });

// Essentials = "bp_basic", Professional = "bp_link_pro"
const PRO_SUBSCRIPTIONS = new Set(['bp_link_pro']);

export function classifySubscription(subscription: string): SubscriptionTier {
  const normalized = subscription.trim().toLowerCase();
  if (PRO_SUBSCRIPTIONS.has(normalized) || normalized.includes('pro')) {
    return Object.freeze({ kind: 'pro', subscription });
  }
  return Object.freeze({ kind: 'standard', subscription });
}

/**
 * Upstream quality string for a requested tier. Everything is `medium` until
 * validation has confirmed a pro subscription.
 */
export function resolveUpstreamQuality(tier: SubscriptionTier, quality: QualityTier): UpstreamQuality {
  if (tier.kind !== 'pro') return 'medium';
  switch (quality) {
    case QualityTier.HIGH:
      return 'high';
    case QualityTier.LOSSLESS:
    case QualityTier.HIFI:
      return 'lossless';
    default:
      return 'medium';
  }
}

export interface CodecSelection {
  codec: Codec;
  bitrate: number;
  bitDepth: number | null;
  sampleRate: number;
}

// MINIMUM-MEDIUM = 128kbit/s AAC, HIGH = 256kbit/s AAC, LOSSLESS-HIFI = FLAC 44.1/16
export function resolveCodec(quality: QualityTier, tier: SubscriptionTier): CodecSelection {
  if (quality === QualityTier.LOSSLESS || quality === QualityTier.HIFI) {
    return { codec: Codec.FLAC, bitrate: 1411, bitDepth: 16, sampleRate: 44.1 };
  }
  const highAllowed =
    quality === QualityTier.HIGH && resolveUpstreamQuality(tier, QualityTier.HIGH) === 'high';
  return { codec: Codec.AAC, bitrate: highAllowed ? 256 : 128, bitDepth: null, sampleRate: 44.1 };
}
