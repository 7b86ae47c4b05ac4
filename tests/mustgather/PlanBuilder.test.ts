import {
  buildResourcePlan,
  clusterRoleBindingName,
  gatherContainerName,
  withoutNamespace,
} from '../../src/mustgather/PlanBuilder';
import type { PlanConfig } from '../../src/mustgather/types';

function planConfig(overrides: Partial<PlanConfig> = {}): PlanConfig {
  return {
    nodeSelector: {},
    hostNetwork: false,
    gatherCommand: '/usr/bin/gather',
    images: [],
    sourceDir: '/must-gather',
    namespace: 'mg-test',
    keepNamespace: false,
    allComponentImages: false,
    ...overrides,
  };
}

function containersOf(config: PlanConfig) {
  return buildResourcePlan(config).pod.spec?.containers ?? [];
}

describe('buildResourcePlan', () => {
  it('uses one default-image gather container followed by the wait container', () => {
    const containers = containersOf(planConfig());
    expect(containers.map((c) => c.name)).toEqual(['gather', 'wait']);
    expect(containers[0].image).toBe('registry.redhat.io/openshift4/ose-must-gather:latest');
    expect(containers[1]).toEqual({
      name: 'wait',
      image: 'registry.redhat.io/ubi9/ubi-minimal',
      imagePullPolicy: 'IfNotPresent',
      command: ['/bin/bash', '-c', 'sleep infinity'],
      volumeMounts: [{ name: 'must-gather-collection', mountPath: '/must-gather' }],
    });
  });

  it('creates one gather container per image in order', () => {
    const images = ['quay.io/example/a:1', 'quay.io/example/b:1', 'quay.io/example/c:1'];
    const containers = containersOf(planConfig({ images }));
    expect(containers.map((c) => c.name)).toEqual(['gather', 'gather-2', 'gather-3', 'wait']);
    expect(containers.slice(0, 3).map((c) => c.image)).toEqual(images);
  });

  it('runs the gather command through bash and mounts the source directory', () => {
    const [gather] = containersOf(
      planConfig({ gatherCommand: '/usr/bin/timeout 600s /usr/bin/gather', sourceDir: '/data' }),
    );
    expect(gather.command).toEqual(['/bin/bash', '-c', '/usr/bin/timeout 600s /usr/bin/gather']);
    expect(gather.imagePullPolicy).toBe('IfNotPresent');
    expect(gather.volumeMounts).toEqual([{ name: 'must-gather-collection', mountPath: '/data' }]);
  });

  it('sets MUST_GATHER_SINCE on every gather container only', () => {
    const containers = containersOf(planConfig({ since: '5s', images: ['a', 'b'] }));
    expect(containers[0].env).toEqual([{ name: 'MUST_GATHER_SINCE', value: '5s' }]);
    expect(containers[1].env).toEqual([{ name: 'MUST_GATHER_SINCE', value: '5s' }]);
    expect(containers[2].env).toBeUndefined();
  });

  it('leaves env out when since is not set', () => {
    expect(containersOf(planConfig())[0].env).toBeUndefined();
  });

  it('gives every gather container its own copy of the template', () => {
    const containers = containersOf(planConfig({ images: ['a', 'b'] }));
    expect(containers[0].volumeMounts).not.toBe(containers[1].volumeMounts);
  });

  it('builds the pod with fixed scheduling settings', () => {
    const { pod } = buildResourcePlan(planConfig());
    expect(pod.apiVersion).toBe('v1');
    expect(pod.kind).toBe('Pod');
    expect(pod.metadata).toEqual({ generateName: 'must-gather-', namespace: 'mg-test' });
    expect(pod.spec?.serviceAccountName).toBe('must-gather-collector');
    expect(pod.spec?.priorityClassName).toBe('system-cluster-critical');
    expect(pod.spec?.restartPolicy).toBe('Never');
    expect(pod.spec?.tolerations).toEqual([{ operator: 'Exists' }]);
    expect(pod.spec?.volumes).toEqual([{ name: 'must-gather-collection', emptyDir: {} }]);
    expect(pod.spec?.nodeName).toBeUndefined();
    expect(pod.spec?.nodeSelector).toBeUndefined();
    expect(pod.spec?.hostNetwork).toBeUndefined();
  });

  it('adds node placement and host network when requested', () => {
    const { pod } = buildResourcePlan(
      planConfig({ nodeName: 'worker-0', nodeSelector: { role: 'infra' }, hostNetwork: true }),
    );
    expect(pod.spec?.nodeName).toBe('worker-0');
    expect(pod.spec?.nodeSelector).toEqual({ role: 'infra' });
    expect(pod.spec?.hostNetwork).toBe(true);
  });

  it('binds cluster-admin to the collector service account', () => {
    const plan = buildResourcePlan(planConfig());
    expect(plan.namespace).toEqual({
      apiVersion: 'v1',
      kind: 'Namespace',
      metadata: { name: 'mg-test' },
    });
    expect(plan.serviceAccount).toEqual({
      apiVersion: 'v1',
      kind: 'ServiceAccount',
      metadata: { name: 'must-gather-collector', namespace: 'mg-test' },
    });
    expect(plan.clusterRoleBinding).toEqual({
      apiVersion: 'rbac.authorization.k8s.io/v1',
      kind: 'ClusterRoleBinding',
      metadata: { name: 'must-gather-collector-mg-test' },
      roleRef: {
        apiGroup: 'rbac.authorization.k8s.io',
        kind: 'ClusterRole',
        name: 'cluster-admin',
      },
      subjects: [{ kind: 'ServiceAccount', name: 'must-gather-collector', namespace: 'mg-test' }],
    });
  });

  it('reports the names the instructions refer to', () => {
    expect(buildResourcePlan(planConfig({ images: ['a', 'b'] })).names).toEqual({
      namespace: 'mg-test',
      serviceAccount: 'must-gather-collector',
      clusterRoleBinding: 'must-gather-collector-mg-test',
      gatherContainers: ['gather', 'gather-2'],
    });
  });

  it('returns equal plans for equal configs', () => {
    const config = planConfig({ since: '1h', images: ['a'] });
    expect(buildResourcePlan(config)).toEqual(buildResourcePlan(config));
  });
});

describe('withoutNamespace', () => {
  it('drops only the namespace descriptor', () => {
    const plan = buildResourcePlan(planConfig());
    const trimmed = withoutNamespace(plan);
    expect(trimmed.namespace).toBeUndefined();
    expect(trimmed.serviceAccount).toBe(plan.serviceAccount);
    expect(trimmed.clusterRoleBinding).toBe(plan.clusterRoleBinding);
    expect(trimmed.pod).toBe(plan.pod);
    expect(trimmed.names).toBe(plan.names);
  });
});

describe('naming', () => {
  it('derives the binding name from the namespace alone', () => {
    expect(clusterRoleBindingName('ns-a')).toBe('must-gather-collector-ns-a');
    expect(clusterRoleBindingName('ns-a')).toBe(clusterRoleBindingName('ns-a'));
  });

  it('numbers gather containers from the second one', () => {
    expect([0, 1, 2].map(gatherContainerName)).toEqual(['gather', 'gather-2', 'gather-3']);
  });
});
