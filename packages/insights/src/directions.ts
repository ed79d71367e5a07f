import type { Direction, LineId } from "crowding-shared/types";

/** Human-readable caption for each line's direction codes */
export const DIRECTION_CAPTIONS: Readonly<Record<LineId, Readonly<Record<Direction, string>>>> =
  Object.freeze({
    "1호선": { 상선: "상선 (서울역 방향)", 하선: "하선 (청량리 방향)" },
    "2호선": { 내선: "내선 (시계방향)", 외선: "외선 (반시계방향)" },
    "3호선": { 상선: "상선 (대화 방향)", 하선: "하선 (오금 방향)" },
    "4호선": { 상선: "상선 (당고개 방향)", 하선: "하선 (오이도 방향)" },
    "5호선": { 상선: "상선 (방화 방향)", 하선: "하선 (하남검단산 방향)" },
    "6호선": { 상선: "상선 (봉화산 방향)", 하선: "하선 (응암 방향)" },
    "7호선": { 상선: "상선 (장암 방향)", 하선: "하선 (부평구청 방향)" },
    "8호선": { 상선: "상선 (암사 방향)", 하선: "하선 (모란 방향)" },
  });

export function describeDirection(line: LineId, direction: Direction): string {
  return DIRECTION_CAPTIONS[line]?.[direction] ?? direction;
}
