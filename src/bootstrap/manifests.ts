/**
 * Inline manifests for the NodePort services the bootstrap owns.
 */

import { KUBERNETES } from '@/config/constants';
import type { K8sManifest } from '@/infra/kubernetes/client';

/**
 * Exposes the per-user dashboard on the port kind maps to the host.
 */
export function dashboardNodePortService(): K8sManifest {
  const { namespace, nodePortService, deployment, port, nodePort } = KUBERNETES.dashboard;
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: nodePortService, namespace },
    spec: {
      type: 'NodePort',
      selector: { 'k8s-app': deployment },
      ports: [{ port, targetPort: port, nodePort }],
    },
  };
}

/**
 * Exposes the MinIO API and console on fixed node ports so containers on the
 * kind network can reach them through the node address.
 */
export function minioNodePortService(): K8sManifest {
  const { namespace, nodePortService, apiPort, apiNodePort, consolePort, consoleNodePort } =
    KUBERNETES.minio;
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: nodePortService, namespace },
    spec: {
      type: 'NodePort',
      selector: { app: 'minio' },
      ports: [
        { name: 'api', port: apiPort, targetPort: apiPort, nodePort: apiNodePort },
        { name: 'console', port: consolePort, targetPort: consolePort, nodePort: consoleNodePort },
      ],
    },
  };
}
