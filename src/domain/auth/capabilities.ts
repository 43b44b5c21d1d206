import { domainError, ErrorCode } from '../../errors/taxonomy.js';
import { Address, AppState, Permission, Position, RoleGrant } from '../../types.js';

export const ANY_SCOPE = '*';

export const hasPermission = (
  roles: RoleGrant[],
  caller: Address,
  permission: Permission,
  scope: string = ANY_SCOPE,
): boolean => roles.some((grant) => (
  grant.address === caller
  && grant.permission === permission
  && (grant.scope === ANY_SCOPE || grant.scope === scope)
));

/** Boundary check for privileged operations. */
export const requirePermission = (
  state: AppState,
  caller: Address,
  permission: Permission,
  scope: string = ANY_SCOPE,
): void => {
  if (!hasPermission(state.roles, caller, permission, scope)) {
    throw domainError(
      ErrorCode.MissingRole,
      `${caller} lacks ${permission}${scope === ANY_SCOPE ? '' : ` on ${scope}`}.`,
      { caller, permission, scope },
    );
  }
};

export type PositionAccess = 'owner' | 'ownerOrDelegate';

export const requirePositionAccess = (
  state: AppState,
  caller: Address,
  position: Position,
  access: PositionAccess,
): void => {
  if (caller === position.owner) return;
  if (access === 'ownerOrDelegate' && hasPermission(state.roles, caller, 'position.delegate')) return;

  throw domainError(
    ErrorCode.NotPositionOwner,
    `${caller} may not act on position ${position.id}.`,
    { caller, positionId: position.id },
  );
};

export const grantRole = (state: AppState, grant: RoleGrant): boolean => {
  if (hasPermission(state.roles, grant.address, grant.permission, grant.scope)) return false;
  state.roles.push(grant);
  return true;
};

export const revokeRole = (state: AppState, grant: RoleGrant): boolean => {
  const before = state.roles.length;
  state.roles = state.roles.filter((existing) => !(
    existing.address === grant.address
    && existing.permission === grant.permission
    && existing.scope === grant.scope
  ));
  return state.roles.length !== before;
};

const ADDRESS_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export const requireAddress = (value: string, field: string): Address => {
  if (!ADDRESS_PATTERN.test(value)) {
    throw domainError(ErrorCode.InvalidAddress, `${field} is not a valid address.`, { field, value });
  }
  return value;
};
