/**
 * Application Constants and Defaults
 *
 * Names, ports, paths and timing budgets of the Cube Studio development
 * environment. Paths are relative to the project root.
 */

/**
 * Local kind cluster
 */
export const CLUSTER = {
  name: 'cube-studio',
  nodeName: 'cube-studio-control-plane',
  /** Docker network kind creates for its nodes */
  network: 'kind',
  /** Host port mapped into the node for the dashboard NodePort */
  dashboardHostPort: 30080,
  /** Directories created inside the node for hostPath volumes */
  dataRoot: '/data/k8s/kubeflow',
  dataDirectories: ['pipeline/workspace', 'pipeline/archives', 'global', 'minio'],
} as const;

/**
 * Docker Compose stack
 */
export const COMPOSE = {
  /** Containers as named by Compose for the `docker` project */
  containers: {
    myapp: 'docker-myapp-1',
    frontend: 'docker-frontend-1',
    mysql: 'docker-mysql-1',
    redis: 'docker-redis-1',
    worker: 'docker-worker-1',
    beat: 'docker-beat-1',
  },
  /** Services restarted after a network change */
  restartServices: ['myapp', 'frontend'],
} as const;

/**
 * Kubernetes objects created or patched by the bootstrap
 */
export const KUBERNETES = {
  namespaces: ['infra', 'pipeline', 'jupyter', 'automl', 'service', 'aihub', 'kubeflow'],
  nodeLabels: {
    train: 'true',
    cpu: 'true',
    notebook: 'true',
    service: 'true',
    org: 'public',
    istio: 'true',
    kubeflow: 'true',
    'kubeflow-dashboard': 'true',
    mysql: 'true',
    redis: 'true',
    monitoring: 'true',
    logging: 'true',
  },
  dashboard: {
    namespace: 'kube-system',
    deployment: 'kubernetes-dashboard-user1',
    defaultService: 'kubernetes-dashboard-user1',
    nodePortService: 'kubernetes-dashboard-nodeport',
    serviceAccount: 'kubernetes-dashboard-user1',
    port: 9090,
    nodePort: 30080,
    tokenDuration: '87600h',
  },
  minio: {
    namespace: 'kubeflow',
    service: 'minio',
    nodePortService: 'minio-nodeport',
    apiPort: 9000,
    apiNodePort: 30900,
    consolePort: 9001,
    consoleNodePort: 30901,
  },
  platform: {
    namespace: 'infra',
    deployment: 'kubeflow-dashboard',
    kubeconfigConfigMap: 'kubernetes-config',
  },
} as const;

/**
 * Connection settings written into the platform configuration
 */
export const BACKING_SERVICES = {
  mysql: {
    port: 3306,
    user: 'root',
    password: 'admin',
    database: 'kubeflow',
  },
  minioHostField: 'MINIO_HOST',
  redisHostKey: 'REDIS_HOST',
  mysqlServiceKey: 'MYSQL_SERVICE',
} as const;

export function mysqlServiceUrl(address: string): string {
  const { user, password, port, database } = BACKING_SERVICES.mysql;
  return `mysql+pymysql://${user}:${password}@${address}:${port}/${database}?charset=utf8`;
}

/**
 * Files under the project root
 */
export const PATHS = {
  composeDir: 'install/docker',
  composeFile: 'install/docker/docker-compose.yml',
  platformConfig: 'install/docker/config.py',
  kubeconfig: 'install/docker/kubeconfig/dev-kubeconfig',
  kubernetesDir: 'install/kubernetes',
  rbac: 'install/kubernetes/sa-rbac.yaml',
  dashboardManifests: [
    'install/kubernetes/dashboard/v2.6.1-cluster.yaml',
    'install/kubernetes/dashboard/v2.6.1-user.yaml',
  ],
  storageManifests: [
    'install/kubernetes/pv-pvc-pipeline.yaml',
    'install/kubernetes/pv-pvc-infra.yaml',
    'install/kubernetes/pv-pvc-jupyter.yaml',
    'install/kubernetes/pv-pvc-automl.yaml',
    'install/kubernetes/pv-pvc-service.yaml',
  ],
  workflowManifests: [
    'install/kubernetes/argo/minio-pv-pvc-hostpath.yaml',
    'install/kubernetes/argo/pipeline-runner-rolebinding.yaml',
    'install/kubernetes/argo/install-3.4.3-all.yaml',
    'install/kubernetes/minio/minio-nodeport.yaml',
  ],
  dashboardService: 'install/kubernetes/kubeflow-dashboard-service.yaml',
  overlayDir: 'install/kubernetes/cube/overlays',
  overlayKustomization: 'install/kubernetes/cube/overlays/kustomization.yml',
  overlayEntrypoint: 'install/kubernetes/cube/overlays/config/entrypoint.sh',
} as const;

/**
 * Endpoints probed after a run
 */
export const ENDPOINTS = {
  platform: 'http://localhost',
  dashboard: `http://localhost:${CLUSTER.dashboardHostPort}`,
  dashboardViaProxy: 'http://localhost/k8s/dashboard/user1/',
  inference: 'http://localhost:8080',
} as const;

/**
 * Polling budget for a readiness condition
 */
export interface PollBudget {
  intervalMs: number;
  maxAttempts: number;
  backoffFactor?: number;
  maxIntervalMs?: number;
}

/**
 * Readiness budgets in milliseconds
 */
export const READINESS = {
  /** MySQL healthy after `compose up`: 30 x 2 seconds. */
  mysql: { intervalMs: 2_000, maxAttempts: 30 },
  /** Node Ready after cluster creation: backoff from 2 up to 10 seconds. */
  clusterNode: { intervalMs: 2_000, maxAttempts: 60, backoffFactor: 1.5, maxIntervalMs: 10_000 },
  /** Cluster gone after a forced delete. */
  clusterDeleted: { intervalMs: 1_000, maxAttempts: 15 },
  /** Containers running after a restart. */
  containersRunning: { intervalMs: 2_000, maxAttempts: 15 },
  /** Dashboard deployment available. */
  dashboard: { intervalMs: 5_000, maxAttempts: 24 },
  /** MinIO service registered: 30 x 2 seconds. */
  minioService: { intervalMs: 2_000, maxAttempts: 30 },
  /** Platform deployment available. */
  platform: { intervalMs: 5_000, maxAttempts: 24 },
} as const satisfies Record<string, PollBudget>;

/**
 * Command timeouts in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Quick queries (version, get, inspect): 30 seconds. */
  query: 30_000,
  /** Cluster creation: 5 minutes. */
  clusterCreate: 300_000,
  /** Manifest application: 2 minutes. */
  apply: 120_000,
  /** Compose up/down/restart: 5 minutes. */
  compose: 300_000,
  /** Endpoint probes: 5 seconds. */
  healthCheck: 5_000,
} as const;
