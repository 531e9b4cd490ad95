import { randomUUID } from "crypto";
import { FileManager } from "./file-manager.js";

export interface AttachmentFileInit {
  id?: string | null;
  url?: string | null;
  size?: number | null;
  filename?: string | null;
  content?: Uint8Array | null;
  fileManager?: FileManager;
}

/**
 * A file stored (or about to be stored) as a Zendesk attachment.
 *
 * A file built from an id is saved; a file given content is not, until
 * `save()` uploads it.
 */
export class AttachmentFile {
  private _id: string | null;
  private _url: string | null;
  private _size: number | null;
  private _filename: string;
  private _content: Uint8Array | null;
  private fileManager: FileManager | undefined;

  saved: boolean;
  /** Upload token, set by `save()`. */
  token: string | null = null;

  constructor(init: AttachmentFileInit = {}) {
    this._id = init.id ?? null;
    this._url = init.url ?? null;
    this._size = init.size ?? null;
    this._filename = init.filename || randomUUID();
    this._content = init.content ?? null;
    this.fileManager = init.fileManager;
    this.saved = this._id !== null && this._content === null;
  }

  get id(): string | null {
    return this._id;
  }

  get url(): string | null {
    return this._url;
  }

  get size(): number | null {
    return this._size;
  }

  get filename(): string {
    return this._filename;
  }

  get content(): Uint8Array | null {
    return this._content;
  }

  set content(value: Uint8Array) {
    if (!(value instanceof Uint8Array)) {
      throw new TypeError("Attachment content must be a Uint8Array.");
    }
    this._content = value;
    this.saved = false;
  }

  /** True when there is something to point at or to upload. */
  get present(): boolean {
    return this._id !== null || this._content !== null;
  }

  /**
   * Uploads the content unless the file is already saved.
   */
  async save(fileManager?: FileManager): Promise<void> {
    if (this.saved) {
      return;
    }
    if (!this._content) {
      throw new Error(`AttachmentFile '${this._filename}' has no content to upload.`);
    }

    const manager = this.resolveManager(fileManager);
    const { token, attachment } = await manager.upload(this._filename, this._content);
    this._id = attachment.id;
    this._filename = attachment.filename;
    this._url = attachment.url;
    this._size = attachment.size;
    this.token = token;
    this.saved = true;
  }

  /**
   * Saves the file if needed, then adds it to a ticket as a comment.
   */
  async saveWithTicket(
    ticketId: string | number,
    comment?: string,
    fileManager?: FileManager
  ): Promise<unknown> {
    await this.save(fileManager);
    if (!this.token) {
      throw new Error(
        `AttachmentFile '${this._filename}' was not uploaded by this process and has no upload token.`
      );
    }
    return this.resolveManager(fileManager).sendToTicket(ticketId, this.token, comment);
  }

  toString(): string {
    return `AttachmentFile(id=${this._id ?? "null"}, filename=${this._filename}, saved=${this.saved})`;
  }

  private resolveManager(fileManager: FileManager | undefined): FileManager {
    if (fileManager) {
      this.fileManager = fileManager;
    }
    this.fileManager ??= FileManager.fromEnv();
    return this.fileManager;
  }
}
