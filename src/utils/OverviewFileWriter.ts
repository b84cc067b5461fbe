/**
 * Overview HTML 파일 저장
 *
 * 경로: outputDir/{filename}
 * - 디렉토리 없으면 재귀 생성
 * - UTF-8 저장
 */

import * as fs from "fs/promises";
import * as path from "path";
import { ScrapeError, ScrapeErrorType, describeError } from "@/core/domain/ScrapeError";

export interface WrittenFile {
  filepath: string;
  bytes: number;
}

export class OverviewFileWriter {
  async write(
    outputDir: string,
    filename: string,
    html: string,
  ): Promise<WrittenFile> {
    const filepath = path.join(outputDir, filename);

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(filepath, html, { encoding: "utf8" });
    } catch (error) {
      throw new ScrapeError(
        ScrapeErrorType.WRITE_FAILED,
        `Overview 파일 저장 실패 (${filepath}): ${describeError(error)}`,
        { cause: error },
      );
    }

    return { filepath, bytes: Buffer.byteLength(html, "utf8") };
  }
}
