/**
 * Request bodies sent to the management API.
 */

export type ResourceLimits = {
  memory: number;
  swap: number;
  disk: number;
  io: number;
  cpu: number;
};

export type FeatureLimits = {
  databases: number;
  backups: number;
  allocations: number;
};

export type CreateServerPayload = {
  name: string;
  user: number;
  egg: number;
  docker_image: string;
  startup: string;
  environment: Record<string, string>;
  limits: ResourceLimits;
  feature_limits: FeatureLimits;
  allocation: { default: number };
  start_on_completion: boolean;
  skip_scripts: boolean;
  description?: string;
  external_id?: string;
};

export type ServerDetailsPayload = {
  name: string;
  user: number;
  description: string;
  external_id?: string;
};

export type ServerBuildPayload = {
  allocation: number;
  limits: ResourceLimits;
  feature_limits: FeatureLimits;
};

export type ServerStartupPayload = {
  startup: string;
  egg: number;
  image: string;
  environment: Record<string, string>;
  skip_scripts: boolean;
};

export type UserPayload = {
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password?: string;
  root_admin?: boolean;
};

export type RolePayload = {
  name: string;
  description: string;
};

export type NodePayload = {
  name: string;
  location_id: number;
  fqdn: string;
  scheme: 'http' | 'https';
  memory: number;
  memory_overallocate: number;
  disk: number;
  disk_overallocate: number;
  daemonSftp: number;
  daemonListen: number;
};

export type AllocationPayload = {
  ip: string;
  ports: string[];
  alias?: string;
};

export type MountPayload = {
  name: string;
  source: string;
  target: string;
  description: string;
  read_only: boolean;
  user_mountable: boolean;
};

export type DatabaseHostPayload = {
  name: string;
  host: string;
  port: number;
  username: string;
  password?: string;
};
