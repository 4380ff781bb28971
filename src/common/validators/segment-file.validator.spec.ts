import { Readable } from 'stream';
import { SegmentFileValidator } from './segment-file.validator';

function upload(originalname: string, mimetype: string, size: number): Express.Multer.File {
  return {
    fieldname: 'segment',
    originalname,
    encoding: '7bit',
    mimetype,
    size,
    destination: '',
    filename: originalname,
    path: '',
    buffer: Buffer.alloc(size),
    stream: Readable.from([]),
  };
}

describe('SegmentFileValidator', () => {
  const validator = new SegmentFileValidator({ maxSize: 2 * 1024 * 1024 });

  it('accepts clips, keyframes and text descriptors', () => {
    expect(validator.isValid(upload('clip.mp4', 'video/mp4', 10))).toBe(true);
    expect(validator.isValid(upload('frame.jpg', 'image/jpeg', 10))).toBe(true);
    expect(validator.isValid(upload('scene.txt', 'text/plain', 10))).toBe(true);
  });

  it('falls back to the extension for untyped uploads', () => {
    expect(validator.isValid(upload('clip.MKV', 'application/octet-stream', 10))).toBe(true);
    expect(validator.isValid(upload('notes.pdf', 'application/octet-stream', 10))).toBe(false);
  });

  it('explains what is wrong', () => {
    expect(validator.buildErrorMessage()).toBe('No segment file provided');
    expect(validator.buildErrorMessage(upload('clip.mp4', 'video/mp4', 0))).toBe(
      'Segment file is empty',
    );
    expect(validator.buildErrorMessage(upload('clip.mp4', 'video/mp4', 3 * 1024 * 1024))).toBe(
      'File size (3MB) exceeds maximum allowed size (2MB)',
    );
    expect(validator.buildErrorMessage(upload('doc.pdf', 'application/pdf', 10))).toBe(
      'Unsupported segment content: application/pdf. Expected a video clip, an image or text/plain',
    );
  });
});
