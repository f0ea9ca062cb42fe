import { toChunkPayload } from './qdrant-vector.index';

describe('toChunkPayload', () => {
  it('keeps the chunk fields of a well-formed payload', () => {
    expect(
      toChunkPayload({
        documentId: 'doc-1',
        filename: 'notes.md',
        chunkIndex: 2,
        text: 'Refunds take five days.',
        extra: true,
      }),
    ).toEqual({
      documentId: 'doc-1',
      filename: 'notes.md',
      chunkIndex: 2,
      text: 'Refunds take five days.',
    });
  });

  it('returns null for missing or mistyped fields', () => {
    expect(toChunkPayload(null)).toBeNull();
    expect(toChunkPayload('doc-1')).toBeNull();
    expect(toChunkPayload({ documentId: 'doc-1', filename: 'a.txt', text: 'x' })).toBeNull();
    expect(
      toChunkPayload({ documentId: 'doc-1', filename: 'a.txt', chunkIndex: '0', text: 'x' }),
    ).toBeNull();
  });
});
