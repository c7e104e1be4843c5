/**
 * Image checks run before any backend call
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_MAX_IMAGE_SIZE_MB = 4.5;

export interface ImageCheck {
  valid: boolean;
  reason: string;
  sizeMb: number;
}

/**
 * Verify the image exists and is within the size limit
 */
export function validateImage(imagePath: string, maxSizeMb: number = DEFAULT_MAX_IMAGE_SIZE_MB): ImageCheck {
  if (!fs.existsSync(imagePath)) {
    return { valid: false, reason: `Image not found: ${imagePath}`, sizeMb: 0 };
  }

  const stats = fs.statSync(imagePath);
  if (!stats.isFile()) {
    return { valid: false, reason: `Not a file: ${imagePath}`, sizeMb: 0 };
  }

  const sizeMb = stats.size / (1024 * 1024);
  if (sizeMb > maxSizeMb) {
    return {
      valid: false,
      reason: `Image exceeds maximum size: ${sizeMb.toFixed(2)}MB > ${maxSizeMb}MB (${path.basename(imagePath)})`,
      sizeMb
    };
  }

  return { valid: true, reason: 'ok', sizeMb };
}
