import { StoreError, type StoreEntity } from '../errors';

const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const isObjectIdHex = (id: string) => OBJECT_ID_PATTERN.test(id);

export function assertObjectId(id: string, entity: StoreEntity): void {
  if (!isObjectIdHex(id)) {
    throw new StoreError('invalid_id', entity);
  }
}
