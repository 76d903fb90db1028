import type { SixelEncoderKind } from '../config/engine-config.js';
import { SimpleSixelEncoder, type SixelEncoder } from './sixel-encoder.js';
import { HqSixelEncoder, type HqSixelEncoderSettings } from './sixel-hq-encoder.js';

export function createSixelEncoder(kind: SixelEncoderKind, settings: HqSixelEncoderSettings = {}): SixelEncoder {
  return kind === 'simple' ? new SimpleSixelEncoder() : new HqSixelEncoder(settings);
}
