/**
 * OverviewFileWriter 단위 테스트
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { OverviewFileWriter } from "@/utils/OverviewFileWriter";
import { ScrapeErrorType } from "@/core/domain/ScrapeError";

describe("OverviewFileWriter", () => {
  let tmpDir: string;
  const writer = new OverviewFileWriter();

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "overview-writer-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("디렉토리를 만들고 UTF-8로 저장", async () => {
    const outputDir = path.join(tmpDir, "nested", "overview");

    const written = await writer.write(outputDir, "item_1.html", "<p>é</p>");

    expect(written).toEqual({
      filepath: path.join(outputDir, "item_1.html"),
      bytes: 9,
    });
    await expect(fs.readFile(written.filepath, "utf8")).resolves.toBe(
      "<p>é</p>",
    );
  });

  it("빈 HTML도 파일로 저장", async () => {
    const written = await writer.write(tmpDir, "empty_1.html", "");

    expect(written.bytes).toBe(0);
    await expect(fs.readFile(written.filepath, "utf8")).resolves.toBe("");
  });

  it("저장 실패는 WRITE_FAILED", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "file");

    await expect(
      writer.write(path.join(blocker, "sub"), "item_1.html", "<p></p>"),
    ).rejects.toMatchObject({ type: ScrapeErrorType.WRITE_FAILED });
  });
});
