import busboy from "busboy";
import type { Request } from "express";

export type UploadedFile = {
  field: string;
  filename: string;
  mime: string;
  data: Buffer;
};

export type UploadErrorCode = "invalid_content_type" | "file_too_large" | "too_many_files" | "malformed_upload";

export class UploadError extends Error {
  constructor(readonly code: UploadErrorCode, message: string, readonly status: number) {
    super(message);
    this.name = "UploadError";
  }
}

export type UploadLimits = { maxFileBytes: number; maxFiles: number };

/** Buffers every file part of a multipart/form-data request. */
export function readUploads(req: Request, limits: UploadLimits): Promise<UploadedFile[]> {
  const contentType = req.headers["content-type"] || "";
  if (!contentType.toLowerCase().startsWith("multipart/form-data")) {
    return Promise.reject(new UploadError("invalid_content_type", "Expected multipart/form-data", 400));
  }

  return new Promise<UploadedFile[]>((resolve, reject) => {
    let bb: busboy.Busboy;
    try {
      bb = busboy({
        headers: req.headers,
        defParamCharset: "utf8",
        limits: { fileSize: limits.maxFileBytes, files: limits.maxFiles },
      });
    } catch (e) {
      reject(new UploadError("malformed_upload", e instanceof Error ? e.message : String(e), 400));
      return;
    }

    const parts: Array<Omit<UploadedFile, "data"> & { chunks: Buffer[] }> = [];
    let failure: UploadError | null = null;

    bb.on("file", (field, stream, info) => {
      const part = { field, filename: info.filename, mime: info.mimeType, chunks: [] as Buffer[] };
      parts.push(part);
      stream.on("data", (d: Buffer) => part.chunks.push(d));
      stream.on("limit", () => {
        failure = failure ?? new UploadError("file_too_large", `${info.filename} exceeds ${limits.maxFileBytes} bytes`, 413);
      });
    });
    bb.on("filesLimit", () => {
      failure = failure ?? new UploadError("too_many_files", `At most ${limits.maxFiles} files per request`, 413);
    });
    bb.on("error", (err: unknown) => {
      reject(new UploadError("malformed_upload", err instanceof Error ? err.message : String(err), 400));
    });
    bb.on("close", () => {
      if (failure) {
        reject(failure);
        return;
      }
      resolve(parts.map(({ chunks, ...rest }) => ({ ...rest, data: Buffer.concat(chunks) })));
    });

    req.pipe(bb);
  });
}
