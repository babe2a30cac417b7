import type { DiagnosticsSink } from './diagnostics'

export interface PacketRegistryOptions {
  readonly diagnostics?: DiagnosticsSink
  readonly clock?: () => number
}

export interface ResolvedRegistryOptions {
  readonly diagnostics: DiagnosticsSink | null
  readonly clock: () => number
}

export const REGISTRY_DEFAULTS: ResolvedRegistryOptions = {
  diagnostics: null,
  clock: () => Date.now(),
}

export const resolveRegistryOptions = (
  options: PacketRegistryOptions = {},
): ResolvedRegistryOptions => ({
  diagnostics: options.diagnostics ?? REGISTRY_DEFAULTS.diagnostics,
  clock: options.clock ?? REGISTRY_DEFAULTS.clock,
})
