import { z } from "zod";
import { ZendeskClient, type ZendeskHttpClient } from "../client.js";
import { expectPayload } from "../core/payload.js";

const AttachmentSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  file_name: z.string(),
  content_url: z.string(),
  size: z.number(),
  content_type: z.string().optional(),
});

const UploadResponseSchema = z.object({
  upload: z.object({
    token: z.string(),
    attachment: AttachmentSchema,
  }),
});

const AttachmentResponseSchema = z.object({
  attachment: AttachmentSchema,
});

export interface AttachmentDetails {
  id: string;
  filename: string;
  url: string;
  /** Size in bytes. */
  size: number;
  contentType?: string;
}

export interface UploadResult {
  token: string;
  attachment: AttachmentDetails;
}

function toDetails(attachment: z.output<typeof AttachmentSchema>): AttachmentDetails {
  const details: AttachmentDetails = {
    id: attachment.id,
    filename: attachment.file_name,
    url: attachment.content_url,
    size: attachment.size,
  };
  if (attachment.content_type !== undefined) {
    details.contentType = attachment.content_type;
  }
  return details;
}

/**
 * Uploads, ticket attachment and attachment lookups.
 */
export class FileManager {
  private client: ZendeskHttpClient;

  constructor(client: ZendeskHttpClient) {
    this.client = client;
  }

  static fromEnv(): FileManager {
    return new FileManager(ZendeskClient.fromEnv());
  }

  async upload(filename: string, content: Uint8Array): Promise<UploadResult> {
    const response = await this.client.post("/uploads.json", {
      query: { filename },
      body: content,
    });
    const { upload } = expectPayload(UploadResponseSchema, response.data, "upload");
    return { token: upload.token, attachment: toDetails(upload.attachment) };
  }

  /**
   * Adds a comment carrying a previous upload to a ticket.
   */
  async sendToTicket(
    ticketId: string | number,
    token: string,
    comment = "Attachment added."
  ): Promise<unknown> {
    const response = await this.client.put(`/tickets/${ticketId}.json`, {
      body: { ticket: { comment: { body: comment, uploads: [token] } } },
    });
    return response.data;
  }

  async getAttachmentDetails(attachmentId: string | number): Promise<AttachmentDetails> {
    const response = await this.client.get(`/attachments/${attachmentId}.json`);
    const { attachment } = expectPayload(AttachmentResponseSchema, response.data, "attachment");
    return toDetails(attachment);
  }
}
