/**
 * Shape of a stack descriptor as written on disk (after interpolation,
 * before normalization). Mirrors the subset of the compose file format
 * accepted by schemas/stack.schema.json.
 */

export interface StackFile {
  name?: string;
  services: Record<string, StackFileService>;
  volumes?: Record<string, StackFileVolume | null>;
}

export type DependencyCondition =
  | "service_started"
  | "service_healthy"
  | "service_completed_successfully";

export interface StackFileHealthcheck {
  test?: string | string[];
  interval?: string;
  timeout?: string;
  retries?: number;
  start_period?: string;
  disable?: boolean;
}

export interface StackFileService {
  image?: string;
  build?:
    | string
    | {
        context: string;
        dockerfile?: string;
        args?: Record<string, string>;
      };
  container_name?: string;
  command?: string | string[];
  environment?: Record<string, string | number | boolean | null> | string[];
  env_file?: string | string[];
  ports?: Array<string | number>;
  volumes?: string[];
  depends_on?: string[] | Record<string, { condition?: DependencyCondition }>;
  healthcheck?: StackFileHealthcheck;
  restart?: "no" | "always" | "on-failure" | "unless-stopped";
}

export interface StackFileVolume {
  name?: string;
  external?: boolean;
}
