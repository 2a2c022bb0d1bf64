import { DocumentLoadError } from '../errors';
import { getLogger } from '../logger';
import { DocxDocument, loadDocx } from './docx';
import { LoadOptions } from './types';

export * from './types';
export { createDocument } from './memory';
export { DocxDocument, DocxParagraph, DocxRun, loadDocx, saveDocx } from './docx';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export type AdapterKind = 'docx' | 'doc' | 'unsupported';

export function guessAdapter(filename?: string, mime?: string): AdapterKind {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.docx') || m === DOCX_MIME) return 'docx';
  if (ext.endsWith('.doc') || m.includes('application/msword')) return 'doc';
  // Unnamed uploads are tried as .docx; the container check rejects anything else.
  if (!filename) return 'docx';
  return 'unsupported';
}

export async function loadDocument(buf: Buffer, opts: LoadOptions = {}): Promise<DocxDocument> {
  const log = getLogger('core').child({ filename: opts.filename });
  const adapter = guessAdapter(opts.filename, opts.mime);
  switch (adapter) {
    case 'docx': {
      const doc = await loadDocx(buf, opts);
      log.debug('loadDocument.complete', { adapter, bytes: buf.byteLength, paragraphs: doc.paragraphs.length });
      return doc;
    }
    case 'doc':
      throw new DocumentLoadError('Legacy .doc files are not supported; save the file as .docx', { filename: opts.filename });
    default:
      throw new DocumentLoadError('Only .docx files are supported', { filename: opts.filename });
  }
}
