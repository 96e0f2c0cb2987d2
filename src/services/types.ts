export interface RequestMeta {
  actorType: "api" | "worker";
  requestId?: string | null;
}
