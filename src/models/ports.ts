//boundaries to the outside world; adapters implement these
import type { AssetType, InboundAttachment, InboundEmail, SimilarExperience } from './index.js';

//anything that yields inbound mail: a mailbox poller, a fixture file, a queue consumer
export type EmailSource = AsyncIterable<InboundEmail> | Iterable<InboundEmail>;

export interface ScanVerdict {
  clean: boolean;
  threat?: string;
}

export interface SecurityScanner {
  scan(attachment: InboundAttachment, signal?: AbortSignal): Promise<ScanVerdict>;
}

export interface DocumentDestination {
  assetId: string;
  assetType: AssetType;
  category: string;
}

//where accepted documents land; a documentRef identifies a stored file
export interface DocumentSink {
  store(destination: DocumentDestination, attachment: InboundAttachment): Promise<string>;
  //staging area for documents awaiting review
  hold(attachment: InboundAttachment): Promise<string>;
  relocate(documentRef: string, destination: DocumentDestination): Promise<string>;
  discard(documentRef: string): Promise<void>;
}

export interface SimilarityQuery {
  filename: string;
  subject: string;
  body: string;
}

export interface SimilarityOptions {
  limit: number;
  minSimilarity: number;
  signal?: AbortSignal;
}

export interface SimilarityLookup {
  findSimilar(query: SimilarityQuery, options: SimilarityOptions): Promise<SimilarExperience[]>;
}
