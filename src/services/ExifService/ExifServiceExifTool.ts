import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { Exif, ReadError } from "./Exif";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `檔案不存在: ${filePath}`,
      });
    }
    try {
      const tags = await exiftool.read(filePath);
      if (tags.Orientation === undefined && tags.Model === undefined) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }
      return ok({
        filePath,
        orientation: tags.Orientation,
        cameraModel: tags.Model,
        imageWidth: tags.ImageWidth,
        imageHeight: tags.ImageHeight,
      });
    } catch (error) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}
