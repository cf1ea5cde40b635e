/**
 * sRGB byte to linear float conversion for vertex colors.
 */
export class ColorUtils {
  private static srgbToLinearLUT: Float32Array | null = null;

  static getSrgbToLinearLUT(): Float32Array {
    let lut = ColorUtils.srgbToLinearLUT;
    if (!lut) {
      lut = new Float32Array(256);
      for (let i = 0; i < 256; i++) {
        const s = i / 255;
        lut[i] = s <= 0.04045 ? s / 12.92 : Math.pow((s + 0.055) / 1.055, 2.4);
      }
      ColorUtils.srgbToLinearLUT = lut;
    }
    return lut;
  }

  /** Clamps to 0..255 before the lookup. */
  static byteToLinear(value: number): number {
    return ColorUtils.getSrgbToLinearLUT()[ColorUtils.clampByte(value)];
  }

  static byteToSrgb(value: number): number {
    return ColorUtils.clampByte(value) / 255;
  }

  private static clampByte(value: number): number {
    if (!Number.isFinite(value)) {
      return 0;
    }
    return Math.round(Math.max(0, Math.min(255, value)));
  }
}
