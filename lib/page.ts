import {escape as _escape} from 'lodash';

import {MetricKey, metrics} from './metrics';

//
// Single page grid, one cell per displayed key. The script connects
// to /ws and fills in the middle line from "<key>:<value>" messages,
// reconnecting (and so getting a fresh replay) if the socket drops
export function renderPage(displayKeys: readonly MetricKey[]): string {
    const cells = displayKeys
        .map(
            (key) => `
    <div class="cell" data-key="${key}">
      <div class="top-line">${_escape(metrics[key].label)}</div>
      <div class="middle-line">–</div>
    </div>`
        )
        .join('');

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8"/>
  <meta name="viewport" content="width=device-width,initial-scale=1"/>
  <title>Live NMEA</title>
  <style>
    * { box-sizing: border-box; }
    html, body { margin: 0; width: 100vw; height: 100vh; overflow: hidden; background: rgb(20,32,48); font-family: system-ui, sans-serif; }
    .grid { display: grid; width: 100%; height: 100%; grid-template-columns: repeat(auto-fit, minmax(14em, 1fr)); grid-auto-rows: minmax(0,1fr); gap: 12px; padding: 12px; }
    .cell { background: rgb(46,50,69); border-radius: 8px; display: flex; flex-direction: column; align-items: center; justify-content: center; color: #0f0; user-select: none; }
    .top-line { font-size: 2.5vw; margin: 4px 0; }
    .middle-line { font-size: 5vw; font-weight: bold; font-variant-numeric: tabular-nums; }
  </style>
</head>
<body>
  <div class="grid">${cells}
  </div>
  <script>
  (function () {
    const cells = {};
    document.querySelectorAll('.cell').forEach((el) => (cells[el.dataset.key] = el.querySelector('.middle-line')));
    function connect() {
      const ws = new WebSocket((location.protocol == 'https:' ? 'wss://' : 'ws://') + location.host + '/ws');
      ws.addEventListener('message', (e) => {
        const split = e.data.indexOf(':');
        const cell = cells[e.data.slice(0, split)];
        if (cell) cell.textContent = e.data.slice(split + 1);
      });
      ws.addEventListener('close', () => setTimeout(connect, 2000));
    }
    connect();
  })();
  </script>
</body>
</html>
`;
}

export type Route = 'status' | 'page' | 'not-found';

// Only the path decides what is served, a query string is ignored
export function routeRequest(url: string | undefined): Route {
    let pathname: string;
    try {
        pathname = new URL(url ?? '/', 'http://localhost').pathname;
    } catch (e) {
        if (e instanceof TypeError) {
            return 'not-found';
        }
        throw e;
    }
    if (pathname == '/status') {
        return 'status';
    }
    if (pathname == '/' || pathname == '/index.html') {
        return 'page';
    }
    return 'not-found';
}
