import { FileValidator } from '@nestjs/common';

const SEGMENT_EXTENSIONS = ['mp4', 'mpeg', 'mpg', 'mov', 'webm', 'ts', 'mkv', 'jpg', 'jpeg', 'png'];

/**
 * Validates uploaded segment content: a video clip, a keyframe image or a
 * plain-text descriptor produced by the segmentation step
 */
export class SegmentFileValidator extends FileValidator<{
  maxSize?: number;
}> {
  constructor(
    protected readonly validationOptions: { maxSize?: number } = {},
  ) {
    super(validationOptions);
  }

  isValid(file?: Express.Multer.File): boolean {
    if (!file || file.size === 0) {
      return false;
    }

    if (this.validationOptions.maxSize && file.size > this.validationOptions.maxSize) {
      return false;
    }

    const mimeType = file.mimetype.toLowerCase();
    if (
      mimeType.startsWith('video/') ||
      mimeType.startsWith('image/') ||
      mimeType === 'text/plain'
    ) {
      return true;
    }

    // some clients send clips without a recognised type
    if (mimeType === 'application/octet-stream') {
      const ext = file.originalname.toLowerCase().split('.').pop();
      return SEGMENT_EXTENSIONS.includes(ext ?? '');
    }

    return false;
  }

  buildErrorMessage(file?: Express.Multer.File): string {
    if (!file) {
      return 'No segment file provided';
    }
    if (file.size === 0) {
      return 'Segment file is empty';
    }

    if (this.validationOptions.maxSize && file.size > this.validationOptions.maxSize) {
      const maxSizeMB = Math.round(this.validationOptions.maxSize / (1024 * 1024));
      const fileSizeMB = Math.round(file.size / (1024 * 1024));
      return `File size (${fileSizeMB}MB) exceeds maximum allowed size (${maxSizeMB}MB)`;
    }

    return `Unsupported segment content: ${file.mimetype}. Expected a video clip, an image or text/plain`;
  }
}
