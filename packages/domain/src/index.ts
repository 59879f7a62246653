// ---------------------------------------------------------------------------
// Public surface of the finance domain. Every bounded context is re-exported
// from here; consumers never deep-import a context module.
// ---------------------------------------------------------------------------

export * from './shared/types'
export * from './invoicing/index'
export * from './payables/index'
export * from './ledger/index'
export * from './recurring/index'
export * from './access/index'
export * from './payroll/index'
export * from './reporting/index'
