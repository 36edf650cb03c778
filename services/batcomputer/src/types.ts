export type RecordId = number;

/** Anything a store or catalog can hold: the name is the uniqueness key. */
export interface NamedRecord {
  name: string;
}

export type StoredRecord<T extends NamedRecord> = T & { id: RecordId };

export interface VerifiedUser {
  user_id: string;
  permissions: string[];
}

export interface CurrentUser {
  username: string;
  email: string;
  is_active: boolean;
}
