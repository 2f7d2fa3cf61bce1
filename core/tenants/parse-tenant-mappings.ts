import pc from 'picocolors'

import type { TenantTarget } from '../../types/tenant-target'

/**
 * Parse `tenant=env1,env2` lines into (tenant, environment) pairs.
 *
 * Malformed lines (no `=`, more than one `=`, empty tenant or no environment)
 * and empty environment tokens are skipped with a warning. Duplicate pairs are
 * kept once, in first-seen order.
 *
 * @example
 *   parseTenantMappings(['acme=staging,production'])
 *   // [{ tenant: 'acme', environment: 'staging' },
 *   //  { tenant: 'acme', environment: 'production' }]
 *
 * @param mappings - Raw mapping lines.
 * @returns Tenant targets.
 */
export function parseTenantMappings(mappings: string[]): TenantTarget[] {
  let seen = new Set<string>()
  let targets: TenantTarget[] = []

  for (let raw of mappings) {
    let line = raw.trim()
    if (!line) {
      continue
    }

    let parts = line.split('=')
    let tenant = parts[0]?.trim() ?? ''
    let environments = (parts[1] ?? '')
      .split(',')
      .map(environment => environment.trim())
      .filter(Boolean)

    if (parts.length !== 2 || !tenant || environments.length === 0) {
      console.warn(
        pc.yellow(
          `Item '${line}' of the tenants and environments list is not in ` +
            "the correct format (expected 'tenant=env1,env2'). Skipped.",
        ),
      )
      continue
    }

    for (let environment of environments) {
      let key = `${tenant}=${environment}`
      if (!seen.has(key)) {
        seen.add(key)
        targets.push({ environment, tenant })
      }
    }
  }

  return targets
}
