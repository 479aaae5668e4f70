import type { ApiRecord, Envelope, ResourceType } from "../types.js";
import { ResourceApi, compact } from "./base.js";

export type ProjectList = Envelope<"projects", ApiRecord[]>;
export type ProjectResponse = Envelope<"project", ApiRecord>;

export interface ProjectInput {
  name: string;
  description?: string;
  avatarId?: string;
}

export class ProjectsApi extends ResourceApi {
  list(): Promise<ProjectList> {
    return this.http.get<ProjectList>("/api/v1/projects");
  }

  get(id: number): Promise<ProjectResponse> {
    return this.http.get<ProjectResponse>(`/api/v1/projects/${id}`);
  }

  create(input: ProjectInput): Promise<ProjectResponse | undefined> {
    return this.http.post<ProjectResponse>("/api/v1/projects", {
      body: { name: input.name, description: input.description ?? null, avatar_id: input.avatarId ?? null },
    });
  }

  update(id: number, input: Partial<ProjectInput>): Promise<ProjectResponse | undefined> {
    return this.http.put<ProjectResponse>(`/api/v1/projects/${id}`, {
      body: compact({ name: input.name, description: input.description, avatar_id: input.avatarId }),
    });
  }

  async remove(id: number): Promise<void> {
    await this.http.delete(`/api/v1/projects/${id}`);
  }

  resources(id: number): Promise<ApiRecord> {
    return this.http.get<ApiRecord>(`/api/v1/projects/${id}/resources`);
  }

  moveResource(
    fromProjectId: number,
    toProjectId: number,
    resourceId: number,
    resourceType: ResourceType
  ): Promise<ApiRecord | undefined> {
    return this.http.put<ApiRecord>(`/api/v1/projects/${fromProjectId}/resources/transfer`, {
      body: { to_project: toProjectId, resource_id: resourceId, resource_type: resourceType },
    });
  }
}
