/**
 * Where uploaded curriculums and ticket attachments live. Keys are
 * forward-slash relative paths such as `curriculums/<uuid>.pdf`.
 */
export interface FileStorage {
  save(key: string, content: Buffer, contentType?: string): Promise<string>;
  read(key: string): Promise<Buffer>;
  exists(key: string): Promise<boolean>;
  /** No-op when the key is already gone. */
  remove(key: string): Promise<void>;
}
