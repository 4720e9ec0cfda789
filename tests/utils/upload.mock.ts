// tests/utils/upload.mock.ts
import type { UploadTarget } from "../../src/scene/interfaces.js";

export type WriteRecord = { offset: number; dataOffset: number; size: number };

/** Records writeBuffer calls instead of uploading. */
export class MockUploadTarget implements UploadTarget {
  public writes: WriteRecord[] = [];

  writeBuffer(offset: number, _data: ArrayBuffer, dataOffset: number, size: number): void {
    this.writes.push({ offset, dataOffset, size });
  }

  reset() {
    this.writes.length = 0;
  }
}
