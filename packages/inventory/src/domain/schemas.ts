import { DateSchema, DecimalSchema, NonNegativeDecimalSchema } from '@bullion-ledger/core';
import { z } from 'zod';

/**
 * Zod schemas for validation and parsing
 */

export const MaterialTypeSchema = z.enum(['metal', 'stone', 'other']);

export const LotRequestTypeSchema = z.enum(['purchase', 'sale', 'jewelry_design']);

export const LotStatusSchema = z.enum([
  'pending',
  'approved',
  'completed',
  'confirmed',
  'rejected',
  'pending_seller_price',
  'pending_investor_confirmation',
]);

export const ContractStatusSchema = z.enum([
  'not_assigned',
  'active',
  'completed',
  'terminated',
  'renew',
  'closed',
  'under_termination',
]);

export const ContributionStatusSchema = z.enum(['pending', 'admin_approved', 'approved', 'terminated', 'rejected']);

export const MaterialSpecSchema = z.object({
  materialType: MaterialTypeSchema,
  materialItemId: z.string().min(1),
  materialItemName: z.string().min(1),
  caratTypeId: z.string().min(1).optional(),
  shapeCutId: z.string().min(1).optional(),
  clarityId: z.string().min(1).optional(),
  colorId: z.string().min(1).optional(),
  /** Grams per unit; absent when the lot has no material record */
  unitWeight: NonNegativeDecimalSchema.optional(),
});

export const PurchaseLotSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().min(1).optional(),
  requestType: LotRequestTypeSchema,
  status: LotStatusSchema,
  requestedQuantity: DecimalSchema,
  material: MaterialSpecSchema,
  relatedLotId: z.string().min(1).optional(),
  createdAt: DateSchema,
  deletedAt: DateSchema.optional(),
});

export const InventoryUnitSchema = z.object({
  id: z.string().min(1),
  lotId: z.string().min(1),
  serialNumber: z.string().min(1),
  systemSerialNumber: z.string().min(1).optional(),
  saleLotId: z.string().min(1).optional(),
  contractId: z.string().min(1).optional(),
  poolId: z.string().min(1).optional(),
  deletedAt: DateSchema.optional(),
});

export const ContractSchema = z.object({
  id: z.string().min(1),
  status: ContractStatusSchema,
});

export const ContractUnitHistorySchema = z.object({
  id: z.string().min(1),
  unitId: z.string().min(1),
  contractId: z.string().min(1),
  contributedWeight: NonNegativeDecimalSchema,
  createdAt: DateSchema,
});

export const ProductionAllocationSourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unit'), unitId: z.string().min(1) }),
  z.object({ kind: z.literal('contract_history'), historyId: z.string().min(1), unitId: z.string().min(1) }),
]);

export const ProductionAllocationSchema = z.object({
  id: z.string().min(1),
  productionPaymentId: z.string().min(1),
  source: ProductionAllocationSourceSchema,
  contractId: z.string().min(1).optional(),
  weight: NonNegativeDecimalSchema,
});

export const ContributionTargetSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pool'), poolId: z.string().min(1) }),
  z.object({ type: z.literal('contract'), contractId: z.string().min(1) }),
  z.object({ type: z.literal('production_payment'), productionPaymentId: z.string().min(1) }),
]);

export const ContributionSchema = z.object({
  id: z.string().min(1),
  lotId: z.string().min(1),
  quantity: DecimalSchema,
  status: ContributionStatusSchema,
  target: ContributionTargetSchema,
  createdAt: DateSchema,
  deletedAt: DateSchema.optional(),
});

/**
 * Type exports inferred from schemas
 */
export type MaterialType = z.infer<typeof MaterialTypeSchema>;
export type LotRequestType = z.infer<typeof LotRequestTypeSchema>;
export type LotStatus = z.infer<typeof LotStatusSchema>;
export type ContractStatus = z.infer<typeof ContractStatusSchema>;
export type ContributionStatus = z.infer<typeof ContributionStatusSchema>;
export type MaterialSpec = z.infer<typeof MaterialSpecSchema>;
export type PurchaseLot = z.infer<typeof PurchaseLotSchema>;
export type InventoryUnit = z.infer<typeof InventoryUnitSchema>;
export type Contract = z.infer<typeof ContractSchema>;
export type ContractUnitHistory = z.infer<typeof ContractUnitHistorySchema>;
export type ProductionAllocationSource = z.infer<typeof ProductionAllocationSourceSchema>;
export type ProductionAllocation = z.infer<typeof ProductionAllocationSchema>;
export type ContributionTarget = z.infer<typeof ContributionTargetSchema>;
export type Contribution = z.infer<typeof ContributionSchema>;
