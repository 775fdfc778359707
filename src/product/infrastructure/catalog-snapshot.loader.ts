import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';

/**
 * Catalog Snapshot Loader
 * 시드용 JSON 스냅샷 문서를 읽는다.
 * 파일이 없거나 JSON이 아니면 빈 스냅샷을 돌려준다.
 */
@Injectable()
export class CatalogSnapshotLoader {
  private readonly logger = new Logger(CatalogSnapshotLoader.name);

  async load(filePath: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      this.logger.warn(
        `스냅샷 파일을 읽을 수 없음 - path: ${filePath}`,
        error instanceof Error ? error.message : error,
      );
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      this.logger.warn(
        `스냅샷 파일이 올바른 JSON이 아님 - path: ${filePath}`,
        error instanceof Error ? error.message : error,
      );
      return {};
    }
  }
}
