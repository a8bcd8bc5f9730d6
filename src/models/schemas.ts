//zod schemas for every fact kind, bootstrap file and inbound payload
import { z } from 'zod';
import { ASSET_TYPES, CONFIDENCE_LEVELS, SECURITY_LEVELS } from './index.js';
import type {
  AssetProfile, BusinessRule, CategorySet, ClassificationPattern, EpisodicRecord, FileTypeRule, HumanFeedback, SenderMapping,
} from './index.js';

const text = z.string().trim().min(1);
const confidence = z.number().min(0).max(1);
const categoryName = z.string().trim().min(1).transform(s => s.toLowerCase().replace(/[\s-]+/g, '_'));

export const assetTypeSchema = z.enum(ASSET_TYPES);
export const confidenceLevelSchema = z.enum(CONFIDENCE_LEVELS);
export const securityLevelSchema = z.enum(SECURITY_LEVELS);

//"pdf", ".PDF" and " .pdf " all normalize to ".pdf"
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

//"Jane Doe <Jane@Example.com>" -> "jane@example.com"
export function normalizeSender(sender: string): string {
  const angle = sender.match(/<([^>]+)>/);
  return (angle?.[1] ?? sender).trim().toLowerCase();
}

const identifierList = z.array(z.string())
  .transform(ids => [...new Set(ids.map(i => i.trim().toLowerCase().replace(/\s+/g, ' ')).filter(i => i.length > 0))]);

export const assetProfileSchema: z.ZodType<AssetProfile, z.ZodTypeDef, unknown> = z.object({
  assetId: text,
  dealName: text,
  displayName: text,
  assetType: assetTypeSchema,
  identifiers: identifierList.refine(ids => ids.length > 0, 'at least one identifier is required'),
  businessContext: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  active: z.boolean().default(true),
});

export const categorySetSchema: z.ZodType<CategorySet, z.ZodTypeDef, unknown> = z.object({
  assetType: assetTypeSchema,
  categories: z.array(categoryName).min(1).transform(c => [...new Set(c)]),
});

export const fileTypeRuleSchema: z.ZodType<FileTypeRule, z.ZodTypeDef, unknown> = z.object({
  extension: z.string().trim().min(1).regex(/^\.?[a-z0-9]+$/i, 'extension must be alphanumeric').transform(normalizeExtension),
  isAllowed: z.boolean(),
  securityLevel: securityLevelSchema,
  assetTypes: z.array(assetTypeSchema).default([]),
  documentCategories: z.array(categoryName).default([]),
  successCount: z.number().int().min(0).default(0),
  failureCount: z.number().int().min(0).default(0),
  confidence: confidenceLevelSchema.default('medium'),
});

export const humanFeedbackSchema: z.ZodType<HumanFeedback, z.ZodTypeDef, unknown> = z.object({
  filename: text,
  subject: z.string().default(''),
  sender: z.string().transform(normalizeSender).optional(),
  correctedCategory: categoryName,
  correctedAssetId: z.string().min(1).nullable(),
  originalCategory: categoryName.optional(),
  originalAssetId: z.string().nullable().optional(),
  reviewer: z.string().optional(),
});

export const classificationPatternSchema: z.ZodType<ClassificationPattern, z.ZodTypeDef, unknown> = z.object({
  assetType: assetTypeSchema,
  category: categoryName,
  pattern: text,
  weight: z.number().min(0).max(1).optional(),
});

export const businessRuleSchema: z.ZodType<BusinessRule, z.ZodTypeDef, unknown> = z.object({
  ruleId: text,
  category: text,
  statement: text,
  parameters: z.record(z.number()).default({}),
});

export const episodicRecordSchema: z.ZodType<EpisodicRecord, z.ZodTypeDef, unknown> = z.object({
  filename: text,
  subject: z.string().default(''),
  excerpt: z.string().default(''),
  predictedCategory: categoryName,
  assetId: z.string().min(1).nullable(),
  assetType: assetTypeSchema.nullable(),
  confidence,
  source: z.enum(['auto', 'human_correction']),
  recordedAt: z.string().datetime(),
});

export const senderMappingSchema: z.ZodType<SenderMapping, z.ZodTypeDef, unknown> = z.object({
  senderEmail: z.string().transform(normalizeSender).pipe(z.string().email()),
  assetIds: z.array(text).transform(ids => [...new Set(ids)]),
  trustScore: confidence,
  organization: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
});

//bootstrap files are snake_case on disk
export const assetRecordSchema = z.object({
  asset_id: text,
  deal_name: text,
  asset_name: text,
  asset_type: assetTypeSchema,
  identifiers: z.array(z.string()),
  business_context: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
}).transform(r => ({
  assetId: r.asset_id,
  dealName: r.deal_name,
  displayName: r.asset_name,
  assetType: r.asset_type,
  identifiers: r.identifiers,
  businessContext: r.business_context,
  active: true,
}));

export const fileTypeRecordSchema = z.object({
  extension: text,
  is_allowed: z.boolean(),
  security_level: securityLevelSchema,
  asset_types: z.array(assetTypeSchema).default([]),
  document_categories: z.array(z.string()).default([]),
  success_count: z.number().int().min(0).default(0),
  failure_count: z.number().int().min(0).default(0),
  confidence: confidenceLevelSchema.default('medium'),
}).transform(r => ({
  extension: r.extension,
  isAllowed: r.is_allowed,
  securityLevel: r.security_level,
  assetTypes: r.asset_types,
  documentCategories: r.document_categories,
  successCount: r.success_count,
  failureCount: r.failure_count,
  confidence: r.confidence,
}));

export const categoryRecordSchema = z.object({
  asset_type: assetTypeSchema,
  categories: z.array(z.string()),
}).transform(r => ({ assetType: r.asset_type, categories: r.categories }));

export const patternRecordSchema = z.object({
  asset_type: assetTypeSchema,
  category: z.string(),
  pattern: z.string(),
  weight: z.number().min(0).max(1).optional(),
}).transform(r => ({ assetType: r.asset_type, category: r.category, pattern: r.pattern, weight: r.weight }));

export const businessRuleRecordSchema = z.object({
  rule_id: text,
  category: text,
  statement: text,
  parameters: z.record(z.number()).default({}),
}).transform(r => ({ ruleId: r.rule_id, category: r.category, statement: r.statement, parameters: r.parameters }));

export const senderRecordSchema = z.object({
  sender_email: z.string(),
  asset_ids: z.array(z.string()),
  trust_score: confidence,
  organization: z.string().optional(),
  name: z.string().optional(),
}).transform(r => ({
  senderEmail: r.sender_email, assetIds: r.asset_ids, trustScore: r.trust_score, organization: r.organization, name: r.name,
}));

//inbound email as delivered by an email source
export const inboundEmailSchema = z.object({
  id: text,
  sender: z.string().default(''),
  subject: z.string().optional(),
  body: z.string().optional(),
  receivedAt: z.coerce.date().optional(),
  attachments: z.array(z.object({
    filename: text,
    content: z.instanceof(Buffer),
  })),
});
