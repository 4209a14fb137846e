/**
 * farm-types.ts — Records returned by the farm store.
 *
 * Keys are snake_case: these objects go straight to the dashboard and the
 * chat orchestrator as JSON, and both read the column-style names.
 */

// ─── Unmodeled fields ───────────────────────────────────────────

/**
 * Constant placeholders for fields the live schema does not carry.
 * Callers must treat every value here as non-authoritative.
 */
export const UNMODELED = {
  /** farmers has no size column. Farmer.total_hectares, FarmerSummary.total_size_ha */
  totalHectares: 0,
  /** farmers has no type column. Farmer.farmer_type, FarmerSummary.farm_type, ApprovalEntry.farmer_type */
  farmerType: "Farm",
  /** Display form of the missing size. ApprovalEntry.farmer_size */
  farmerSizeLabel: "0.0",
  /** incoming_messages has no channel column. Turn.message_type */
  messageType: "chat",
  /** No model confidence is stored. Turn.confidence_score */
  confidenceScore: 0.8,
  /** No approval state is stored. Turn.approved_status, DetailView.approved_status */
  approvedStatus: false,
  /** crop_technology is a projection without ids. CropInfo.id */
  cropId: 1,
  /** CropInfo.category */
  cropCategory: "Crop",
  /** CropInfo.planting_season */
  plantingSeason: "Spring",
  /** CropInfo.harvest_season */
  harvestSeason: "Fall",
} as const;

// ─── Enumerations ───────────────────────────────────────────────

export const MESSAGE_ROLES = ["user", "assistant"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Tables covered by the diagnostic counts. Never caller-controlled. */
export const FARM_TABLES = [
  "farmers",
  "fields",
  "field_crops",
  "incoming_messages",
  "crop_technology",
] as const;
export type FarmTable = (typeof FARM_TABLES)[number];

// ─── Records ────────────────────────────────────────────────────

export interface Farmer {
  id: number;
  farm_name: string | null;
  manager_name: string | null;
  manager_last_name: string | null;
  city: string | null;
  wa_phone_number: string | null;
  total_hectares: number;
  farmer_type: string;
}

export interface FarmerSummary {
  id: number;
  name: string;
  farm_name: string;
  phone: string;
  location: string;
  farm_type: string;
  total_size_ha: number;
}

export interface FieldView {
  field_id: number;
  field_name: string | null;
  field_size: number;
  field_location: string | null;
  soil_type: string | null;
  current_crop: string | null;
  variety: string | null;
  /** YYYY-MM-DD */
  planting_date: string | null;
  crop_status: string | null;
}

/** One message, placed in the slot its role selects. The other slot is "". */
export interface ConversationTurn {
  id: number;
  user_input: string;
  ava_response: string;
  /** ISO-8601 */
  timestamp: string | null;
  message_type: string;
  confidence_score: number;
  approved_status: boolean;
}

export interface NewConversation {
  question: string;
  answer: string;
  /** Stored on both rows; "unknown" when omitted. */
  phone?: string;
}

export interface CropInfo {
  id: number;
  crop_name: string;
  localized_name: string;
  category: string;
  planting_season: string;
  harvest_season: string;
  description: string;
}

export interface ApprovalEntry {
  /** Message id */
  id: number;
  farmer_id: number;
  farmer_name: string;
  farmer_phone: string;
  farmer_location: string;
  farmer_type: string;
  farmer_size: string;
  last_message: string;
  timestamp: string | null;
}

export interface ApprovalQueue {
  unapproved: ApprovalEntry[];
  /** Always empty: approval state is not persisted anywhere. */
  approved: ApprovalEntry[];
}

export interface ConversationDetail {
  id: number;
  farmer_id: number;
  farmer_name: string;
  farm_name: string | null;
  farmer_phone: string;
  farmer_location: string;
  user_input: string;
  ava_response: string;
  timestamp: string | null;
  approved_status: boolean;
}

export type TableCounts = Record<FarmTable, number>;
