import { t } from "../i18n";

export interface HudModel {
  length: number;
  boardColumns: number;
}

export function formatHud(model: HudModel): string {
  const left = t("length", { value: model.length });
  const right = t("hint");
  const gap = Math.max(1, model.boardColumns - left.length - right.length);
  return `${left}${" ".repeat(gap)}${right}`;
}
