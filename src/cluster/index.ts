export { KubeApiSource, KUEUE_API, type KubeApiSourceOptions } from './kube-source.js';
export { SnapshotSource } from './snapshot-source.js';
export { resolveKubeCredentials, fromKubeconfig, type KubeCredentials } from './kubeconfig.js';
export {
  RawNodeSchema,
  RawPodSchema,
  RawWorkloadSchema,
  RawJobSchema,
  ClusterSnapshotSchema,
} from './types.js';
export type {
  ObjectMeta,
  RawNode,
  RawPod,
  RawWorkload,
  RawJob,
  JobManifest,
  ClusterSource,
  JobStore,
  ClusterSnapshot,
} from './types.js';
