import { describe, it, expect, beforeEach } from '@jest/globals';
import yaml from 'js-yaml';
import {
  createKubernetesClient,
  deploymentIsAvailable,
  filterKustomizeWarnings,
  nodeIsReady,
  type KubernetesClient,
} from '@/infra/kubernetes/client';
import { minioNodePortService } from '@/bootstrap/manifests';
import { FakeCommandRunner } from '../../../__support__/utilities/fake-runner';
import { createSilentLogger } from '../../../__support__/utilities/fake-environment';

describe('kubectl client', () => {
  let runner: FakeCommandRunner;
  let kube: KubernetesClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    kube = createKubernetesClient(createSilentLogger(), runner);
  });

  describe('ensureNamespace', () => {
    it('should report a new namespace as created', async () => {
      expect(await kube.ensureNamespace('infra')).toEqual({ ok: true, value: 'created' });
      expect(runner.lines()).toEqual(['kubectl create namespace infra']);
    });

    it('should treat AlreadyExists as success', async () => {
      runner.on('kubectl create namespace', {
        exitCode: 1,
        stderr: 'Error from server (AlreadyExists): namespaces "infra" already exists',
      });

      expect(await kube.ensureNamespace('infra')).toEqual({ ok: true, value: 'unchanged' });
    });

    it('should fail on any other error', async () => {
      runner.on('kubectl create namespace', {
        exitCode: 1,
        stderr: 'The connection to the server localhost:8080 was refused',
      });

      const outcome = await kube.ensureNamespace('infra');

      expect(outcome).toMatchObject({
        ok: false,
        error:
          'kubectl create namespace infra failed: The connection to the server localhost:8080 was refused',
      });
    });
  });

  it('should send inline manifests as YAML on standard input', async () => {
    const manifest = minioNodePortService();

    await kube.applyManifest(manifest);

    const call = runner.calls[0];
    expect(call?.args).toEqual(['apply', '-f', '-']);
    expect(yaml.load(call?.options.input ?? '')).toEqual(manifest);
  });

  it('should strip deprecation warnings from kustomize output', async () => {
    runner.on('kubectl apply -k', {
      stdout:
        'Warning: resource configmaps is deprecated\nconfigmap/kubeflow-dashboard-config created\n',
    });

    expect(await kube.applyKustomization('/p/overlays')).toEqual({
      ok: true,
      value: 'configmap/kubeflow-dashboard-config created',
    });
  });

  it('should distinguish deleted from absent resources', async () => {
    runner.on('kubectl delete service gone', { stdout: '' });
    runner.on('kubectl delete service present', { stdout: 'service "present" deleted\n' });

    expect(await kube.deleteResource('service', 'gone', 'kube-system')).toEqual({
      ok: true,
      value: 'absent',
    });
    expect(await kube.deleteResource('service', 'present', 'kube-system')).toEqual({
      ok: true,
      value: 'deleted',
    });
    expect(runner.lines()[0]).toBe('kubectl delete service gone -n kube-system --ignore-not-found');
  });

  it('should overwrite node labels', async () => {
    await kube.labelNode('node-1', { train: 'true', org: 'public' });

    expect(runner.lines()).toEqual(['kubectl label node node-1 train=true org=public --overwrite']);
  });

  it('should create the kubeconfig ConfigMap idempotently', async () => {
    runner.on('kubectl create configmap', {
      exitCode: 1,
      stderr: 'error: failed to create configmap: configmaps "kubernetes-config" already exists',
    });

    expect(await kube.createConfigMapFromFile('kubernetes-config', 'infra', '/p/kubeconfig')).toEqual({
      ok: true,
      value: 'unchanged',
    });
    expect(runner.lines()).toEqual([
      'kubectl create configmap kubernetes-config -n infra --from-file=/p/kubeconfig',
    ]);
  });

  it('should read node readiness from the JSON status', async () => {
    runner.on('kubectl get node', {
      stdout: JSON.stringify({ status: { conditions: [{ type: 'Ready', status: 'True' }] } }),
    });

    expect(await kube.isNodeReady('cube-studio-control-plane')).toBe(true);
  });

  it('should not treat unparseable output as ready', async () => {
    runner.on('kubectl get deployment', { stdout: 'not json' });

    expect(await kube.deploymentAvailable('kubeflow-dashboard', 'infra')).toBe(false);
  });

  it('should fail token creation on empty output', async () => {
    expect((await kube.createToken('kube-system', 'user', '1h')).ok).toBe(false);
  });

  describe('status parsing', () => {
    it('should require a Ready=True condition', () => {
      expect(nodeIsReady({ status: { conditions: [{ type: 'Ready', status: 'False' }] } })).toBe(false);
      expect(nodeIsReady({ status: {} })).toBe(false);
      expect(nodeIsReady('garbage')).toBe(false);
    });

    it('should require at least one available replica', () => {
      expect(deploymentIsAvailable({ status: { availableReplicas: 1 } })).toBe(true);
      expect(deploymentIsAvailable({ status: { availableReplicas: 0 } })).toBe(false);
      expect(deploymentIsAvailable({})).toBe(false);
    });

    it('should keep non-warning lines', () => {
      expect(filterKustomizeWarnings('a\n  Warning: b\nc\n')).toBe('a\nc');
    });
  });
});
