/** One (tenant, environment) pair parsed from the tenant mapping list. */
export interface TenantTarget {
  /** Branch of the tenant repository the workflow runs on. */
  environment: string

  /** Tenant name, the prefix of `<tenant>.bootstrap.infra`. */
  tenant: string
}
