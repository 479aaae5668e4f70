import type { PollResult } from "../poller.js";
import type { Envelope, ListOptions, StatusRecord, WaitOptions } from "../types.js";
import { ResourceApi, compact } from "./base.js";

export type ImageList = Envelope<"images", StatusRecord[]>;
export type ImageResponse = Envelope<"image", StatusRecord>;

export interface ImageCreateInput {
  diskId: number;
  name?: string;
  description?: string;
  os?: string;
  location?: string;
}

export class ImagesApi extends ResourceApi {
  list(options?: ListOptions): Promise<ImageList> {
    return this.http.get<ImageList>("/api/v1/images", { query: this.page(options) });
  }

  get(id: string): Promise<ImageResponse> {
    return this.http.get<ImageResponse>(`/api/v1/images/${id}`);
  }

  create(input: ImageCreateInput): Promise<ImageResponse | undefined> {
    return this.http.post<ImageResponse>("/api/v1/images", {
      body: compact({
        disk_id: input.diskId,
        name: input.name,
        description: input.description,
        os: input.os,
        location: input.location,
      }),
    });
  }

  update(id: string, input: { name?: string; description?: string }): Promise<ImageResponse | undefined> {
    return this.http.patch<ImageResponse>(`/api/v1/images/${id}`, {
      body: compact({ name: input.name, description: input.description }),
    });
  }

  async remove(id: string): Promise<void> {
    await this.http.delete(`/api/v1/images/${id}`);
  }

  async status(id: string): Promise<string> {
    const { image } = await this.get(id);
    return image.status;
  }

  /**
   * Poll the image until its status is one of `target` (e.g. "created")
   */
  waitForStatus(id: string, target: string | readonly string[], options?: WaitOptions): Promise<PollResult> {
    return this.waitFor(() => this.status(id), target, options);
  }
}
