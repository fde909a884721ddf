export function buildViewerPage(params: { title: string; wsPath: string }): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(params.title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 28px; background: #f6f8fb; color: #111; }
    .container { max-width: 980px; margin: 0 auto; }
    .header { display: flex; align-items: center; justify-content: space-between; gap: 16px; }
    .feed { width: 100%; background: #111; border-radius: 12px; display: block; }
    .meta { margin-top: 14px; display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 12px; }
    .panel { background: #fff; padding: 14px; border-radius: 12px; box-shadow: 0 6px 18px rgba(15, 23, 42, 0.08); }
    .value { font-size: 20px; font-weight: 600; margin-top: 4px; }
    .chip { background: #111; color: #fff; padding: 6px 10px; border-radius: 999px; font-size: 12px; }
    .chip.active { background: #10b981; }
    .chip.unavailable { background: #ef4444; }
    .muted { color: #6b7280; font-size: 12px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>${escapeHtml(params.title)}</h1>
      <span class="chip" id="camera">connecting</span>
    </div>
    <img class="feed" src="/video_feed" alt="Live camera feed" />
    <div class="meta">
      <div class="panel"><div class="muted">Resolution</div><div class="value" id="resolution">--</div></div>
      <div class="panel"><div class="muted">Capture fps</div><div class="value" id="fps">--</div></div>
      <div class="panel"><div class="muted">Viewers</div><div class="value" id="clients">--</div></div>
      <div class="panel"><div class="muted">Frames / errors</div><div class="value" id="frames">--</div></div>
    </div>
    <div class="muted" id="updated" style="margin-top: 12px;">--</div>
  </div>
  <script>
    const render = (data) => {
      const camera = document.getElementById('camera');
      const state = data.camera === 'running' ? 'active' : data.camera;
      camera.textContent = state + ' (' + data.backend + ')';
      camera.className = 'chip ' + state;
      document.getElementById('resolution').textContent = data.resolution;
      document.getElementById('fps').textContent = data.measuredFps + ' / ' + data.captureFps;
      document.getElementById('clients').textContent = data.clients;
      document.getElementById('frames').textContent = data.framesCaptured + ' / ' + data.captureErrors;
      document.getElementById('updated').textContent = 'Updated ' + new Date(data.ts_ms).toLocaleTimeString();
    };
    const connect = () => {
      const scheme = location.protocol === 'https:' ? 'wss' : 'ws';
      const ws = new WebSocket(scheme + '://' + location.host + '${params.wsPath}');
      ws.onmessage = (evt) => {
        const data = JSON.parse(evt.data);
        if (data.type === 'stream_status') render(data);
      };
      ws.onclose = () => {
        document.getElementById('camera').textContent = 'disconnected';
        setTimeout(connect, 2000);
      };
    };
    connect();
  </script>
</body>
</html>`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
