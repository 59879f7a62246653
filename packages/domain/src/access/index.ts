// ---------------------------------------------------------------------------
// Access bounded context
// Staff roles and the module capabilities each role holds. The table is
// resolved once at start-up and passed to whoever needs to check access.
// ---------------------------------------------------------------------------

import type { UserId } from '../shared/types'

export type Role =
  | 'admin'
  | 'architect'
  | 'senior_architect'
  | 'junior_architect'
  | 'managing_director'
  | 'site_engineer'
  | 'senior_civil_engineer'
  | 'junior_civil_engineer'
  | 'finance'
  | 'accountant'
  | 'project_manager'
  | 'designer'
  | 'senior_interior_designer'
  | 'junior_interior_designer'
  | 'draughtsman'
  | 'visualiser_3d'
  | 'qs'
  | 'procurement'
  | 'client_liaison'
  | 'intern'
  | 'viewer'

export const ROLES: readonly Role[] = [
  'admin',
  'architect',
  'senior_architect',
  'junior_architect',
  'managing_director',
  'site_engineer',
  'senior_civil_engineer',
  'junior_civil_engineer',
  'finance',
  'accountant',
  'project_manager',
  'designer',
  'senior_interior_designer',
  'junior_interior_designer',
  'draughtsman',
  'visualiser_3d',
  'qs',
  'procurement',
  'client_liaison',
  'intern',
  'viewer',
] as const

export type Capability =
  | 'clients'
  | 'leads'
  | 'projects'
  | 'site_visits'
  | 'finance'
  | 'invoices'
  | 'docs'
  | 'team'
  | 'users'
  | 'settings'

export const CAPABILITIES: readonly Capability[] = [
  'clients',
  'leads',
  'projects',
  'site_visits',
  'finance',
  'invoices',
  'docs',
  'team',
  'users',
  'settings',
] as const

export function isRole(raw: string): raw is Role {
  return ROLES.some((role) => role === raw)
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Grants for the base roles. */
export const DEFAULT_GRANTS: Readonly<Partial<Record<Role, readonly Capability[]>>> = {
  admin: CAPABILITIES,
  managing_director: ['clients', 'leads', 'projects', 'site_visits', 'docs', 'team', 'finance'],
  architect: ['clients', 'leads', 'projects', 'site_visits', 'docs', 'team'],
  site_engineer: ['projects', 'site_visits'],
  finance: ['clients', 'projects', 'docs', 'finance', 'invoices'],
  accountant: ['clients', 'projects', 'docs', 'finance', 'invoices'],
  project_manager: ['clients', 'leads', 'projects', 'site_visits', 'docs', 'team'],
  designer: ['projects', 'docs'],
  draughtsman: ['projects', 'docs'],
  viewer: ['clients', 'leads', 'projects', 'site_visits'],
}

/** Specialised titles that share a base role's grants. */
export const ROLE_ALIASES: Readonly<Partial<Record<Role, Role>>> = {
  senior_architect: 'architect',
  junior_architect: 'architect',
  senior_civil_engineer: 'site_engineer',
  junior_civil_engineer: 'site_engineer',
  senior_interior_designer: 'designer',
  junior_interior_designer: 'designer',
  visualiser_3d: 'designer',
}

// ---------------------------------------------------------------------------
// Permission table
// ---------------------------------------------------------------------------

export type PermissionTable = ReadonlyMap<Role, ReadonlySet<Capability>>

/**
 * Resolves defaults, aliases and overrides into one immutable lookup.
 *
 * Resolution per role: an explicit override, else the role's own default,
 * else its alias target's default, else nothing. Viewers never hold `docs`,
 * whatever the override says.
 */
export function buildPermissionTable(
  overrides: Readonly<Partial<Record<Role, readonly Capability[]>>> = {},
): PermissionTable {
  const table = new Map<Role, ReadonlySet<Capability>>()
  for (const role of ROLES) {
    const alias = ROLE_ALIASES[role]
    const grants =
      overrides[role] ?? DEFAULT_GRANTS[role] ?? (alias !== undefined ? DEFAULT_GRANTS[alias] : undefined) ?? []
    const resolved = new Set<Capability>(grants)
    if (role === 'viewer') resolved.delete('docs')
    table.set(role, resolved)
  }
  return table
}

/** The staff member performing a request or job. */
export interface Actor {
  readonly id: UserId
  readonly role: Role
  readonly isSuperuser: boolean
}

/** Superusers hold every capability regardless of role. */
export function hasCapability(table: PermissionTable, actor: Actor, capability: Capability): boolean {
  if (actor.isSuperuser) return true
  return table.get(actor.role)?.has(capability) ?? false
}

export function capabilitiesOf(table: PermissionTable, actor: Actor): readonly Capability[] {
  return CAPABILITIES.filter((capability) => hasCapability(table, actor, capability))
}
