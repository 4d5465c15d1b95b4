export {
  calculateContrastRatio,
  formatRatio,
  fromDeviceCmyk,
  fromDeviceGray,
  fromDeviceRgb,
  isLargeText,
  parseColor,
  requiredContrastRatio,
  toHex,
  WHITE,
} from './color.js';
export type { RGBA } from './color.js';
export { sha256Hex } from './hash.js';
export { assertViolation, isCheckEnabled, isSeverity, sortViolations } from './violations.js';
