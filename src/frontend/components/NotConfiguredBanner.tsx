import type { FunctionalComponent } from "preact";

interface Props {
  onRecheck: () => void;
}
export const NotConfiguredBanner: FunctionalComponent<Props> = ({
  onRecheck,
}) => (
  <div className="not-configured-banner" role="alert">
    <div className="banner-content">
      <span className="banner-icon">⚠️</span>
      <div className="banner-text">
        <strong>Board Not Configured</strong>
        <p>The console has no usable board settings. To fix it:</p>
        <ul>
          <li>
            Copy <code>.env.example</code> to <code>.env.local</code>
          </li>
          <li>
            Set <code>VESTABOARD_HOST</code> to the board's IP address
          </li>
          <li>
            Set <code>VESTABOARD_API_KEY</code> to your Local API key
          </li>
          <li>Restart the console</li>
        </ul>
      </div>
      <button className="btn btn-warning" onClick={onRecheck} type="button">
        Check Again
      </button>
    </div>
  </div>
);
