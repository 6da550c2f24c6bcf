/**
 * @module @action-engine/runtime/materialize/archive-extractor
 */

import AdmZip from 'adm-zip';

export interface ArchiveExtractor {
  /** Unpack every entry of the archive under `destination`. */
  extractAll(archivePath: string, destination: string): Promise<void>;
}

export class AdmZipExtractor implements ArchiveExtractor {
  async extractAll(archivePath: string, destination: string): Promise<void> {
    const zip = new AdmZip(archivePath);
    zip.extractAllTo(destination, true);
  }
}
