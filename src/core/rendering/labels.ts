/**
 * Ownership labels stamped on everything the reconciler creates
 */

export const MANAGED_BY = 'kubeconverge';

export const LABEL_NAME = 'app.kubernetes.io/name';
export const LABEL_INSTANCE = 'app.kubernetes.io/instance';
export const LABEL_PART_OF = 'app.kubernetes.io/part-of';
export const LABEL_MANAGED_BY = 'app.kubernetes.io/managed-by';

export function deploymentLabels(deploymentName: string, component?: string): Record<string, string> {
  return {
    ...(component && { [LABEL_NAME]: component }),
    [LABEL_INSTANCE]: deploymentName,
    [LABEL_PART_OF]: deploymentName,
    [LABEL_MANAGED_BY]: MANAGED_BY,
  };
}

/**
 * Labels that select the pods of one workload component
 */
export function podSelectorLabels(deploymentName: string, component: string): Record<string, string> {
  return {
    [LABEL_NAME]: component,
    [LABEL_INSTANCE]: deploymentName,
  };
}

export function toLabelSelector(labels: Record<string, string>): string {
  return Object.entries(labels)
    .map(([key, value]) => `${key}=${value}`)
    .join(',');
}

/**
 * Selects every object of a deployment
 */
export function instanceSelector(deploymentName: string): string {
  return toLabelSelector({ [LABEL_INSTANCE]: deploymentName, [LABEL_MANAGED_BY]: MANAGED_BY });
}
