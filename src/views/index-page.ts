import type { StationDisplay } from '../utils/weather.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const show = (value: string | number | null): string => (value === null ? '--' : escapeHtml(String(value)));

export const renderIndexPage = (display: StationDisplay): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${show(display.stationId)} current conditions</title>
  <link rel="stylesheet" href="/static/styles.css">
</head>
<body>
  <main class="conditions">
    <header>
      <h1>${show(display.stationId)}</h1>
      <p class="report-time">Reported ${show(display.reportTime || null)}</p>
    </header>
    <dl>
      <dt>Temperature</dt>
      <dd id="temperature">${show(display.currentTempF)}&deg;F / ${show(display.currentTempC)}&deg;C</dd>
      <dt>Feels like</dt>
      <dd id="feels-like">${show(display.feelsLikeF)}&deg;F / ${show(display.feelsLikeC)}&deg;C</dd>
      <dt>Dew point</dt>
      <dd id="dew-point">${show(display.dewPointF)}&deg;F / ${show(display.dewPointC)}&deg;C</dd>
      <dt>Humidity</dt>
      <dd id="humidity">${show(display.humidity)}%</dd>
      <dt>Wind</dt>
      <dd id="wind">${show(display.windDirCompass)} (${show(display.windDirDegrees)}&deg;) at ${show(display.windSpeed)} ${show(display.windSpeedUnit)}, gusting ${show(display.windGust)} ${show(display.windSpeedUnit)}</dd>
    </dl>
    <footer>
      <p class="secret">${show(display.randomSecret)}</p>
    </footer>
  </main>
</body>
</html>
`;
