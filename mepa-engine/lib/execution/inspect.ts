import type { CellView, MachineInspection } from "@/lib/mepa-schema";
import type { MachineState } from "../core/state";

/**
 * メモリとスタックを 1 本の番地列として並べる。
 * スタックの番地はメモリ末尾の続きから振る。
 */
export function inspectState(state: Readonly<MachineState>): MachineInspection {
  const cells: CellView[] = state.memory.map((value, address) => ({
    address,
    value,
    region: "memory",
  }));
  const base = state.memory.length;
  state.stack.forEach((value, i) => {
    cells.push({ address: base + i, value, region: "stack" });
  });

  return { memory: [...state.memory], stack: [...state.stack], cells };
}
