import { avatarViolations, detectImageType, UploadedImage } from './avatar-image';

function upload(buffer: Buffer, mimetype = 'image/png'): UploadedImage {
  return { buffer, originalname: 'file', mimetype, size: buffer.length };
}

describe('detectImageType', () => {
  it.each([
    ['image/png', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00])],
    ['image/jpeg', Buffer.from([0xff, 0xd8, 0xff, 0xe0])],
    ['image/gif', Buffer.from('GIF89a....')],
    ['image/webp', Buffer.from('RIFF\x00\x00\x00\x00WEBPVP8 ')],
    ['image/bmp', Buffer.from('BM\x00\x00\x00\x00')],
  ])('recognizes %s by its bytes', (mime, bytes) => {
    expect(detectImageType(bytes)).toBe(mime);
  });

  it('returns null for anything else', () => {
    expect(detectImageType(Buffer.from('%PDF-1.7'))).toBeNull();
  });

  it('does not accept SVG documents', () => {
    const svg = '<?xml version="1.0"?><svg xmlns="http://www.w3.org/2000/svg"></svg>';

    expect(detectImageType(Buffer.from(svg))).toBeNull();
    expect(detectImageType(Buffer.from('<html><svg onload="x()"></svg></html>'))).toBeNull();
  });
});

describe('avatarViolations', () => {
  const png = Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    Buffer.alloc(24),
  ]);

  it('accepts a small image', () => {
    expect(avatarViolations(upload(png), 2048)).toEqual([]);
  });

  it('ignores the declared mime type and checks the content', () => {
    expect(avatarViolations(upload(Buffer.from('plain text'), 'image/png'), 2048)).toEqual([
      'The avatar field must be an image.',
    ]);
  });

  it('rejects an empty file', () => {
    expect(avatarViolations(upload(Buffer.alloc(0)), 2048)).toEqual([
      'The avatar field must be an image.',
    ]);
  });

  it('reports an image over the size limit', () => {
    const big = Buffer.concat([png, Buffer.alloc(2048)]);

    expect(avatarViolations(upload(big), 1)).toEqual([
      'The avatar field must not be greater than 1 kilobytes.',
    ]);
  });
});
