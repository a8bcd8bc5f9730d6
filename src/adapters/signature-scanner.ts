//minimal content scanner: flags executables and the EICAR test signature
import type { InboundAttachment } from '../models/index.js';
import type { ScanVerdict, SecurityScanner } from '../models/ports.js';

const EICAR = 'EICAR-STANDARD-ANTIVIRUS-TEST-FILE';

//magic bytes of formats that are never accepted as documents
const EXECUTABLE_MAGIC: [string, Buffer][] = [
  ['windows executable', Buffer.from('MZ')],
  ['elf binary', Buffer.from([0x7f, 0x45, 0x4c, 0x46])],
];

export class SignatureScanner implements SecurityScanner {
  async scan(attachment: InboundAttachment, signal?: AbortSignal): Promise<ScanVerdict> {
    signal?.throwIfAborted();
    for (const [name, magic] of EXECUTABLE_MAGIC) {
      if (attachment.content.subarray(0, magic.length).equals(magic)) return { clean: false, threat: name };
    }
    if (attachment.content.includes(EICAR)) return { clean: false, threat: 'eicar test signature' };
    return { clean: true };
  }
}
