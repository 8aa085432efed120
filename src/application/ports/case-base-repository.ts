import type { CaseBase, CaseRecord } from "../../domain/entities/case";

export interface CaseBaseRepository<C extends CaseRecord> {
  load(): Promise<CaseBase<C>>;
}
