import type { FunctionalComponent } from "preact";
import { decodeCode, tileName } from "../../board/charset.ts";
import type { BoardGrid } from "../../board/grid.ts";

interface Props {
  grid: BoardGrid;
  label: string;
}

/** Read-only rendering of a 6×22 grid; colour tiles render as swatches. */
export const BoardView: FunctionalComponent<Props> = ({ grid, label }) => (
  <div aria-label={label} className="board" role="grid">
    {grid.map((row, r) => (
      <div className="board-row" key={`row-${r}`} role="row">
        {row.map((code, c) => {
          const tile = tileName(code);
          return (
            <span
              className={tile ? `board-cell tile-${tile}` : "board-cell"}
              key={`cell-${r}-${c}`}
              role="gridcell"
              title={tile}
            >
              {tile ? "" : decodeCode(code)}
            </span>
          );
        })}
      </div>
    ))}
  </div>
);
