export type ObjectRef = {
  bucket: string;
  key: string;
};

export interface ObjectStore {
  /** Writes the object to `destPath`, using whatever credentials the environment provides. */
  downloadObject(ref: ObjectRef, destPath: string): Promise<void>;
}
