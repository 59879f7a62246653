// ---------------------------------------------------------------------------
// In-memory FinanceStore for service and handler tests
//
// Records are kept as the rows the SQL schema holds; aggregates are assembled
// on read the way the pg repositories join them. Ids are sequential per table
// (`invoice-1`, `payment-1`, ...) so tests can name them up front.
// `transaction` snapshots every table and restores it when `fn` throws.
// ---------------------------------------------------------------------------

import type {
  Bill,
  BillId,
  BillPayment,
  BillPaymentId,
  ClientAdvance,
  ClientAdvanceAllocation,
  ClientAdvanceId,
  ClientId,
  ExpenseClaim,
  ExpenseClaimId,
  ExpenseClaimPayment,
  ExpenseClaimPaymentId,
  Invoice,
  InvoiceId,
  InvoiceLine,
  IsoDate,
  LeadId,
  LedgerEntry,
  LedgerEntryId,
  Payment,
  PaymentId,
  ProjectId,
  Receipt,
  ReceiptId,
  RecurringRule,
  RecurringRuleId,
  StaffMember,
  UserId,
} from '@studioledger/domain'
import {
  amount,
  compareDates,
  nextSequence,
  originKey,
  toAllocationId,
  toBillId,
  toBillPaymentId,
  toClientAdvanceId,
  toClientId,
  toExpenseClaimId,
  toExpenseClaimPaymentId,
  toInvoiceId,
  toInvoiceLineId,
  toLeadId,
  toLedgerEntryId,
  toPaymentId,
  toProjectId,
  toReceiptId,
  toRecurringRuleId,
  toUserId,
} from '@studioledger/domain'
import type { FinanceStore, LeadRef, ProjectRef } from '../store'

type InvoiceRecord = Omit<Invoice, 'lines' | 'payments' | 'allocations' | 'clientId' | 'projectCode'>
type AdvanceRecord = Omit<ClientAdvance, 'allocations'>
type BillRecord = Omit<Bill, 'payments'>
type ClaimRecord = Omit<ExpenseClaim, 'payment'>
type StaffRecord = StaffMember & { isActive: boolean }

interface Tables {
  projects: Map<ProjectId, ProjectRef>
  leads: Map<LeadId, LeadRef>
  staff: Map<UserId, StaffRecord>
  invoices: Map<InvoiceId, InvoiceRecord>
  lines: Map<string, InvoiceLine>
  payments: Map<PaymentId, Payment>
  receipts: Map<ReceiptId, Receipt>
  advances: Map<ClientAdvanceId, AdvanceRecord>
  allocations: Map<string, ClientAdvanceAllocation>
  bills: Map<BillId, BillRecord>
  billPayments: Map<BillPaymentId, BillPayment>
  claims: Map<ExpenseClaimId, ClaimRecord>
  claimPayments: Map<ExpenseClaimPaymentId, ExpenseClaimPayment>
  ledger: Map<LedgerEntryId, LedgerEntry>
  rules: Map<RecurringRuleId, RecurringRule>
  sequences: Map<string, number>
}

function emptyTables(): Tables {
  return {
    projects: new Map(),
    leads: new Map(),
    staff: new Map(),
    invoices: new Map(),
    lines: new Map(),
    payments: new Map(),
    receipts: new Map(),
    advances: new Map(),
    allocations: new Map(),
    bills: new Map(),
    billPayments: new Map(),
    claims: new Map(),
    claimPayments: new Map(),
    ledger: new Map(),
    rules: new Map(),
    sequences: new Map(),
  }
}

// Records are replaced rather than mutated, so copying each map is a full snapshot.
function snapshot(tables: Tables): Tables {
  return {
    projects: new Map(tables.projects),
    leads: new Map(tables.leads),
    staff: new Map(tables.staff),
    invoices: new Map(tables.invoices),
    lines: new Map(tables.lines),
    payments: new Map(tables.payments),
    receipts: new Map(tables.receipts),
    advances: new Map(tables.advances),
    allocations: new Map(tables.allocations),
    bills: new Map(tables.bills),
    billPayments: new Map(tables.billPayments),
    claims: new Map(tables.claims),
    claimPayments: new Map(tables.claimPayments),
    ledger: new Map(tables.ledger),
    rules: new Map(tables.rules),
    sequences: new Map(tables.sequences),
  }
}

function maxSequence(values: Iterable<string>, prefix: string): number {
  return nextSequence(prefix, values) - 1
}

export interface MemoryStore extends FinanceStore {
  seedProject(input: { code: string; clientId?: string; id?: string }): ProjectRef
  seedLead(input?: { clientId?: string; id?: string }): LeadRef
  seedStaff(input: { name: string; monthlySalary?: string; isActive?: boolean; id?: string }): StaffMember
  /** Every ledger row, in insertion order. */
  ledgerRows(): LedgerEntry[]
}

export function createMemoryStore(): MemoryStore {
  let tables = emptyTables()
  let inTransaction = false

  const nextId = (table: string): string => {
    const next = (tables.sequences.get(table) ?? 0) + 1
    tables.sequences.set(table, next)
    return `${table}-${next}`
  }

  const values = <K, V>(map: Map<K, V>): V[] => [...map.values()]

  const hydrateInvoice = (record: InvoiceRecord): Invoice => {
    const project = record.projectId !== undefined ? tables.projects.get(record.projectId) : undefined
    const lead = record.leadId !== undefined ? tables.leads.get(record.leadId) : undefined
    const clientId = project?.clientId ?? lead?.clientId
    return {
      ...record,
      ...(clientId !== undefined ? { clientId } : {}),
      ...(project !== undefined ? { projectCode: project.code } : {}),
      lines: values(tables.lines).filter((l) => l.invoiceId === record.id),
      payments: values(tables.payments)
        .filter((p) => p.invoiceId === record.id)
        .sort((a, b) => compareDates(a.paymentDate, b.paymentDate)),
      allocations: values(tables.allocations).filter((a) => a.invoiceId === record.id),
    }
  }

  const hydrateAdvance = (record: AdvanceRecord): ClientAdvance => ({
    ...record,
    allocations: values(tables.allocations).filter((a) => a.advanceId === record.id),
  })

  const hydrateBill = (record: BillRecord): Bill => ({
    ...record,
    payments: values(tables.billPayments)
      .filter((p) => p.billId === record.id)
      .sort((a, b) => compareDates(a.paymentDate, b.paymentDate)),
  })

  const hydrateClaim = (record: ClaimRecord): ExpenseClaim => {
    const payment = values(tables.claimPayments).find((p) => p.claimId === record.id)
    return { ...record, ...(payment !== undefined ? { payment } : {}) }
  }

  const requireInvoice = (id: InvoiceId): InvoiceRecord => {
    const record = tables.invoices.get(id)
    if (!record) throw new Error(`invoice ${id} does not exist`)
    return record
  }

  const store: MemoryStore = {
    invoices: {
      async create(input) {
        if (values(tables.invoices).some((i) => i.invoiceNumber === input.invoiceNumber)) {
          throw new Error(`duplicate invoice number ${input.invoiceNumber}`)
        }
        const id = toInvoiceId(nextId('invoice'))
        const { lines, ...fields } = input
        tables.invoices.set(id, { ...fields, id })
        for (const line of lines) {
          const lineId = toInvoiceLineId(nextId('line'))
          tables.lines.set(lineId, { ...line, id: lineId, invoiceId: id })
        }
        return hydrateInvoice(requireInvoice(id))
      },
      async findById(id) {
        const record = tables.invoices.get(id)
        return record ? hydrateInvoice(record) : null
      },
      async list({ limit, offset, status }) {
        return values(tables.invoices)
          .filter((i) => status === undefined || i.status === status)
          .sort((a, b) => compareDates(b.invoiceDate, a.invoiceDate))
          .slice(offset, offset + limit)
          .map(hydrateInvoice)
      },
      async listUnpaid() {
        return values(tables.invoices)
          .filter((i) => i.status !== 'paid')
          .sort((a, b) => compareDates(a.dueDate, b.dueDate))
          .map(hydrateInvoice)
      },
      async updateStatus(id, status) {
        tables.invoices.set(id, { ...requireInvoice(id), status })
      },
      async delete(id) {
        tables.invoices.delete(id)
        for (const [key, line] of tables.lines) {
          if (line.invoiceId === id) tables.lines.delete(key)
        }
        for (const [key, allocation] of tables.allocations) {
          if (allocation.invoiceId === id) tables.allocations.delete(key)
        }
      },
      async maxSequenceWithPrefix(prefix) {
        return maxSequence(
          values(tables.invoices).map((i) => i.invoiceNumber),
          prefix,
        )
      },
    },

    payments: {
      async create(input) {
        requireInvoice(input.invoiceId)
        const payment: Payment = { ...input, id: toPaymentId(nextId('payment')) }
        tables.payments.set(payment.id, payment)
        return payment
      },
      async findById(id) {
        return tables.payments.get(id) ?? null
      },
      async update(payment) {
        tables.payments.set(payment.id, payment)
        return payment
      },
    },

    receipts: {
      async create(input) {
        if (values(tables.receipts).some((r) => r.paymentId === input.paymentId)) {
          throw new Error(`payment ${input.paymentId} already has a receipt`)
        }
        const receipt: Receipt = { ...input, id: toReceiptId(nextId('receipt')) }
        tables.receipts.set(receipt.id, receipt)
        return receipt
      },
      async findByPaymentId(paymentId) {
        return values(tables.receipts).find((r) => r.paymentId === paymentId) ?? null
      },
      async update(receipt) {
        const current = tables.receipts.get(receipt.id)
        if (!current) throw new Error(`receipt ${receipt.id} does not exist`)
        const updated: Receipt = {
          ...current,
          amount: receipt.amount,
          method: receipt.method,
          reference: receipt.reference,
        }
        tables.receipts.set(updated.id, updated)
        return updated
      },
      async maxSequenceWithPrefix(prefix) {
        return maxSequence(
          values(tables.receipts).map((r) => r.receiptNumber),
          prefix,
        )
      },
    },

    advances: {
      async create(input) {
        const record: AdvanceRecord = { ...input, id: toClientAdvanceId(nextId('advance')) }
        tables.advances.set(record.id, record)
        return hydrateAdvance(record)
      },
      async findById(id) {
        const record = tables.advances.get(id)
        return record ? hydrateAdvance(record) : null
      },
      async update(advance) {
        const { allocations: _allocations, ...record } = advance
        tables.advances.set(record.id, record)
        return hydrateAdvance(record)
      },
      async createAllocation(input) {
        const allocation: ClientAdvanceAllocation = { ...input, id: toAllocationId(nextId('allocation')) }
        tables.allocations.set(allocation.id, allocation)
        return allocation
      },
    },

    bills: {
      async create(input) {
        const record: BillRecord = { ...input, id: toBillId(nextId('bill')) }
        tables.bills.set(record.id, record)
        return hydrateBill(record)
      },
      async findById(id) {
        const record = tables.bills.get(id)
        return record ? hydrateBill(record) : null
      },
      async listUnpaid() {
        return values(tables.bills)
          .filter((b) => b.status !== 'paid')
          .sort((a, b) => compareDates(a.dueDate ?? a.billDate, b.dueDate ?? b.billDate))
          .map(hydrateBill)
      },
      async updateStatus(id, status) {
        const record = tables.bills.get(id)
        if (!record) throw new Error(`bill ${id} does not exist`)
        tables.bills.set(id, { ...record, status })
      },
    },

    billPayments: {
      async create(input) {
        const payment: BillPayment = { ...input, id: toBillPaymentId(nextId('bill-payment')) }
        tables.billPayments.set(payment.id, payment)
        return payment
      },
      async findById(id) {
        return tables.billPayments.get(id) ?? null
      },
      async update(payment) {
        tables.billPayments.set(payment.id, payment)
        return payment
      },
    },

    claims: {
      async create(input) {
        const record: ClaimRecord = { ...input, id: toExpenseClaimId(nextId('claim')), status: 'submitted' }
        tables.claims.set(record.id, record)
        return hydrateClaim(record)
      },
      async findById(id) {
        const record = tables.claims.get(id)
        return record ? hydrateClaim(record) : null
      },
      async update(claim) {
        const { payment: _payment, ...record } = claim
        tables.claims.set(record.id, record)
        return hydrateClaim(record)
      },
      async createPayment(input) {
        if (values(tables.claimPayments).some((p) => p.claimId === input.claimId)) {
          throw new Error(`claim ${input.claimId} is already paid`)
        }
        const payment: ExpenseClaimPayment = { ...input, id: toExpenseClaimPaymentId(nextId('claim-payment')) }
        tables.claimPayments.set(payment.id, payment)
        return payment
      },
    },

    ledger: {
      async findById(id) {
        return tables.ledger.get(id) ?? null
      },
      async findByOrigin(origin) {
        const key = originKey(origin)
        return values(tables.ledger).find((e) => e.origin !== undefined && originKey(e.origin) === key) ?? null
      },
      async insert(draft) {
        const { origin } = draft
        if (origin !== undefined && (await store.ledger.findByOrigin(origin))) {
          throw new Error(`ledger row for ${originKey(origin)} already exists`)
        }
        const entry: LedgerEntry = { ...draft, id: toLedgerEntryId(nextId('ledger')) }
        tables.ledger.set(entry.id, entry)
        return entry
      },
      async update(id, draft) {
        if (!tables.ledger.has(id)) throw new Error(`ledger row ${id} does not exist`)
        const entry: LedgerEntry = { ...draft, id }
        tables.ledger.set(id, entry)
        return entry
      },
      async list({ from, to, category, accountId, limit, offset = 0 }) {
        const rows = values(tables.ledger)
          .filter((e) => from === undefined || compareDates(e.date, from) >= 0)
          .filter((e) => to === undefined || compareDates(e.date, to) < 0)
          .filter((e) => category === undefined || e.category === category)
          .filter((e) => accountId === undefined || e.accountId === accountId)
          .sort((a, b) => compareDates(b.date, a.date) || a.id.localeCompare(b.id))
        return rows.slice(offset, limit === undefined ? undefined : offset + limit)
      },
    },

    recurringRules: {
      async create(input) {
        const rule: RecurringRule = { ...input, id: toRecurringRuleId(nextId('rule')) }
        tables.rules.set(rule.id, rule)
        return rule
      },
      async findById(id) {
        return tables.rules.get(id) ?? null
      },
      async listDue(today: IsoDate) {
        return values(tables.rules).filter((r) => r.isActive && compareDates(r.nextRunDate, today) <= 0)
      },
      async updateNextRunDate(id, nextRunDate) {
        const rule = tables.rules.get(id)
        if (!rule) throw new Error(`rule ${id} does not exist`)
        tables.rules.set(id, { ...rule, nextRunDate })
      },
    },

    directory: {
      async findProject(id) {
        return tables.projects.get(id) ?? null
      },
      async findLead(id) {
        return tables.leads.get(id) ?? null
      },
      async findStaff(id) {
        const staff = tables.staff.get(id)
        return staff ? { id: staff.id, name: staff.name, monthlySalary: staff.monthlySalary } : null
      },
      async listStaff() {
        return values(tables.staff)
          .filter((s) => s.isActive)
          .sort((a, b) => a.name.localeCompare(b.name))
          .map((s) => ({ id: s.id, name: s.name, monthlySalary: s.monthlySalary }))
      },
    },

    async transaction(fn) {
      if (inTransaction) return fn(store)
      const saved = snapshot(tables)
      inTransaction = true
      try {
        return await fn(store)
      } catch (err) {
        tables = saved
        throw err
      } finally {
        inTransaction = false
      }
    },

    seedProject({ code, clientId = 'client-1', id }) {
      const project: ProjectRef = {
        id: toProjectId(id ?? nextId('project')),
        code,
        clientId: toClientId(clientId),
      }
      tables.projects.set(project.id, project)
      return project
    },

    seedLead({ clientId, id } = {}) {
      const resolvedClient: ClientId | undefined = clientId !== undefined ? toClientId(clientId) : undefined
      const lead: LeadRef = {
        id: toLeadId(id ?? nextId('lead')),
        ...(resolvedClient !== undefined ? { clientId: resolvedClient } : {}),
      }
      tables.leads.set(lead.id, lead)
      return lead
    },

    seedStaff({ name, monthlySalary = '0', isActive = true, id }) {
      const member: StaffRecord = {
        id: toUserId(id ?? nextId('user')),
        name,
        monthlySalary: amount(monthlySalary),
        isActive,
      }
      tables.staff.set(member.id, member)
      return { id: member.id, name: member.name, monthlySalary: member.monthlySalary }
    },

    ledgerRows() {
      return values(tables.ledger)
    },
  }

  return store
}
