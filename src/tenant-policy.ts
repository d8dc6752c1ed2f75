import { WriteScopeDeniedError } from './errors.js';

export const TENANT_RECALL_CROSS_SCOPE_DENIED_ERROR = 'blocked by tenant policy: cross-tenant scope denied';
export const TENANT_DEFAULT_SCOPE_FALLBACK_DENIED_ERROR = 'blocked by tenant policy: default scope fallback denied';

const DEFAULT_SCOPE = 'default';

export type TenantPolicyContext = {
  tenantModeEnabled: boolean;
  tenantId: string | null;
};

export function disabledTenantPolicy(): TenantPolicyContext {
  return { tenantModeEnabled: false, tenantId: null };
}

export function enabledTenantPolicy(tenantId: string): TenantPolicyContext {
  return { tenantModeEnabled: true, tenantId };
}

/**
 * Returns the denial message for an entity outside the tenant's scope, or
 * null when access is allowed. With tenant mode on, an entity belongs to
 * the tenant when it equals the tenant id or is namespaced under it
 * (`tenant:...` or `tenant/...`).
 */
export function checkRecallScope(context: TenantPolicyContext, entityId: string): string | null {
  if (!context.tenantModeEnabled) return null;
  const tenantId = (context.tenantId || '').trim();
  const entity = entityId.trim();
  if (!tenantId || !entity || entity === DEFAULT_SCOPE) {
    return TENANT_DEFAULT_SCOPE_FALLBACK_DENIED_ERROR;
  }
  if (entity === tenantId || entity.startsWith(`${tenantId}:`) || entity.startsWith(`${tenantId}/`)) {
    return null;
  }
  return TENANT_RECALL_CROSS_SCOPE_DENIED_ERROR;
}

export function enforceRecallScope(context: TenantPolicyContext, entityId: string): void {
  const denial = checkRecallScope(context, entityId);
  if (denial) throw new WriteScopeDeniedError(denial);
}

export type MemoryWriteContext = {
  entityId: string;
  policyContext: TenantPolicyContext;
};

export function enforceWriteScope(context: MemoryWriteContext): void {
  enforceRecallScope(context.policyContext, context.entityId);
}
