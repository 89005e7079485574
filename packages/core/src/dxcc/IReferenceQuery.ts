import type { CallsignException, Entity, Prefix } from '@dxcc/contracts';

/**
 * 参考表查询接口
 *
 * 同一个键可能对应多条历史记录（有效期互不重叠），
 * 所有查询都返回在 timestamp 时刻有效的第一条记录，顺序即参考表中的原始顺序。
 * 返回的是表内记录本身，不做拷贝；查不到时返回 undefined 而不是抛错。
 */
export interface IReferenceQuery {
  /**
   * 按 ADIF 标识查询实体
   */
  getEntity(adif: number, timestamp: Date): Readonly<Entity> | undefined;

  /**
   * 按前缀字符串查询（如 DL、SV/A）
   */
  getPrefix(prefix: string, timestamp: Date): Readonly<Prefix> | undefined;

  /**
   * 按完整呼号查询呼号例外
   */
  getCallsignException(callsign: string, timestamp: Date): Readonly<CallsignException> | undefined;

  /**
   * 按完整呼号查询 CQ 分区例外，返回分区号
   */
  getZoneException(callsign: string, timestamp: Date): number | undefined;

  /**
   * 完整呼号在该时刻是否属于无效运营
   */
  isInvalidOperation(callsign: string, timestamp: Date): boolean;
}
