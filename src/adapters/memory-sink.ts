//in-memory document sink for the demo and tests
import { v4 as uuidv4 } from 'uuid';
import type { InboundAttachment } from '../models/index.js';
import type { DocumentDestination, DocumentSink } from '../models/ports.js';

export interface HeldDocument {
  ref: string;
  destination: DocumentDestination | null;
  attachment: InboundAttachment;
}

export class MemoryDocumentSink implements DocumentSink {
  private documents = new Map<string, HeldDocument>();

  async store(destination: DocumentDestination, attachment: InboundAttachment): Promise<string> {
    const ref = `${destination.assetId}/${destination.category}/${uuidv4()}-${attachment.filename}`;
    this.documents.set(ref, { ref, destination, attachment });
    return ref;
  }

  async hold(attachment: InboundAttachment): Promise<string> {
    const ref = `_review/${uuidv4()}-${attachment.filename}`;
    this.documents.set(ref, { ref, destination: null, attachment });
    return ref;
  }

  async relocate(documentRef: string, destination: DocumentDestination): Promise<string> {
    const doc = this.documents.get(documentRef);
    if (!doc) throw new Error(`Unknown document ${documentRef}`);
    this.documents.delete(documentRef);
    return this.store(destination, doc.attachment);
  }

  async discard(documentRef: string): Promise<void> {
    this.documents.delete(documentRef);
  }

  get(documentRef: string): HeldDocument | undefined {
    return this.documents.get(documentRef);
  }

  list(): HeldDocument[] {
    return [...this.documents.values()];
  }
}
