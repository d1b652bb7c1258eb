export type IsoTimestamp = string & { __brand: 'IsoTimestamp' };
export type LakeId = string & { __brand: 'LakeId' };

export const createIsoTimestamp = (value: string): IsoTimestamp => value as IsoTimestamp;
export const createLakeId = (value: string): LakeId => value as LakeId;
