import type { SupabaseClient } from "@supabase/supabase-js";
import type { ArchiveRequest, Archiver } from "./pipeline";

export class ArchiveUploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArchiveUploadError";
  }
}

const MAX_NAME_ATTEMPTS = 100;

function isAlreadyExists(error: { message: string }): boolean {
  return /already exists/i.test(error.message);
}

/** `name.pdf` -> `name_<n>.pdf`; the suffix goes before the last extension. */
export function numberedFilename(filename: string, counter: number): string {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0) return `${filename}_${counter}`;
  return `${filename.slice(0, dot)}_${counter}${filename.slice(dot)}`;
}

/**
 * Archives attachments into a Supabase Storage bucket under
 * `<folderPath>/<filename>` and returns the storage path written. Existing
 * objects are never overwritten: a taken name moves on to `<stem>_1<ext>`,
 * `<stem>_2<ext>` and so on.
 */
export class SupabaseStorageArchiver implements Archiver {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly bucket: string,
    private readonly contentOf: (request: ArchiveRequest) => Uint8Array | undefined
  ) {}

  async archive(request: ArchiveRequest): Promise<string> {
    const bytes = this.contentOf(request);
    if (!bytes || bytes.length === 0) {
      throw new ArchiveUploadError(`No content for attachment ${request.attachment.filename}`);
    }

    for (let counter = 0; counter < MAX_NAME_ATTEMPTS; counter++) {
      const filename = counter === 0 ? request.filename : numberedFilename(request.filename, counter);
      const storagePath = `${request.folderPath}/${filename}`;

      const { error } = await this.supabase.storage.from(this.bucket).upload(storagePath, bytes, {
        contentType: "application/pdf",
        cacheControl: "31536000",
        upsert: false,
      });

      if (!error) {
        console.log(`archive: uploaded ${storagePath} (${bytes.length} bytes)`);
        return storagePath;
      }
      if (!isAlreadyExists(error)) {
        throw new ArchiveUploadError(`Storage upload failed: ${error.message}`);
      }
      console.log(`archive: ${storagePath} already exists, trying next name`);
    }

    throw new ArchiveUploadError(
      `Storage upload failed: no free name for ${request.filename} after ${MAX_NAME_ATTEMPTS} attempts`
    );
  }
}
