import type {
  CLOSED_LOCATION,
  DEPARTMENT_CODES,
  FIELD_VALUE_KINDS,
  MOVEMENT_KINDS,
  PSEUDO_DEPARTMENTS,
  REJECTION_REASONS,
} from './constants';

export type DepartmentCode = (typeof DEPARTMENT_CODES)[number];
export type PseudoDepartment = (typeof PSEUDO_DEPARTMENTS)[number];
export type Location = DepartmentCode | PseudoDepartment;
export type EventLocation = Location | typeof CLOSED_LOCATION;
export type MovementKind = (typeof MOVEMENT_KINDS)[number];
export type FieldValueKind = (typeof FIELD_VALUE_KINDS)[number];
export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type AttributeValue = string | number;
export type AttributeBag = Record<string, AttributeValue>;

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: RejectionReason;
  departments?: Location[];
  warnings?: string[];
}
