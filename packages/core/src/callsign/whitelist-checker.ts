import type { IReferenceQuery } from '../dxcc/IReferenceQuery.js';

/**
 * 白名单检查
 *
 * 部分稀有/有争议的实体只承认呼号例外表中列出的呼号。
 * 返回 false 表示该实体在此时刻启用了白名单且呼号不在名单内；其他情况一律返回 true。
 * 不检查呼号本身是否有效，调用前应先用 CallsignAnalyzer 得到 adif。
 *
 * @param call 完整呼号
 * @param adif 分析得到的 ADIF 标识
 * @param timestamp 通联时间
 */
export function isWhitelistAllowed(query: IReferenceQuery, call: string, adif: number, timestamp: Date): boolean {
  // 不是所有 adif 都对应实体（比如 /AM 的 0）
  const entity = query.getEntity(adif, timestamp);
  if (!entity || entity.whitelist !== true) {
    return true;
  }

  // 呼号例外可能指向另一个实体，不能为本实体放行
  const exception = query.getCallsignException(call, timestamp);
  if (exception) {
    return exception.adif === adif;
  }

  const t = timestamp.getTime();
  if (entity.whitelistStart && t < entity.whitelistStart.getTime()) {
    return true;
  }
  if (entity.whitelistEnd && t > entity.whitelistEnd.getTime()) {
    return true;
  }
  return false;
}
