import type { Availability } from "./types.js";

export const RUN_ID_LABEL = "testrelay.run_id";

export interface ContainerMount {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

export interface ContainerCreateSpec {
  image: string;
  argv: string[];
  labels: Record<string, string>;
  mounts: ContainerMount[];
  workdir: string;
  networkMode: "none" | "bridge";
  env: Record<string, string>;
  readOnlyRootFs: boolean;
  tmpfs: string[];
}

export interface ContainerLogLine {
  stream: "stdout" | "stderr";
  text: string;
}

/** The container lifecycle calls the container strategy needs. */
export interface ContainerRuntime {
  ping(): Promise<Availability>;
  /** Pulls the image when it is not present locally; throws ConfigurationError when it cannot. */
  ensureImage(image: string): Promise<void>;
  create(spec: ContainerCreateSpec): Promise<string>;
  /** Starts the container attached; the iterable ends when its output closes. */
  attach(containerId: string): AsyncIterable<ContainerLogLine>;
  /** Exit code of a container whose output has closed. */
  wait(containerId: string): Promise<number>;
  stop(containerId: string, graceSeconds: number): Promise<void>;
  remove(containerId: string): Promise<void>;
  /** Ids of containers (in any state) carrying every given label. */
  list(labels: Record<string, string>): Promise<string[]>;
}
