import type { FunctionalComponent } from "preact";

interface Props {
  busy: boolean;
  disabled: boolean;
  onClear: () => void;
  onMetals: () => void;
}

export const ToolsPanel: FunctionalComponent<Props> = ({
  busy,
  disabled,
  onClear,
  onMetals,
}) => (
  <section className="panel tools-panel">
    <h2>Board Tools</h2>
    <div className="form-group">
      <button
        className="btn btn-secondary"
        disabled={disabled || busy}
        onClick={onMetals}
        type="button"
      >
        Show Metals Prices
      </button>
      <button
        className="btn btn-secondary"
        disabled={disabled || busy}
        onClick={onClear}
        type="button"
      >
        Clear Board
      </button>
    </div>
  </section>
);
