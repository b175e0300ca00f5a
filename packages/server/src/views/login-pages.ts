/**
 * HTML pages of the simulated authorization flow.
 *
 * Rendered with `hono/html`, which escapes every interpolated value.
 */

import { html } from "hono/html";
import type { HtmlEscapedString } from "hono/utils/html";

type Page = HtmlEscapedString | Promise<HtmlEscapedString>;

const STYLE = html`<style>
  body {
    font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
    background: #eef0f7;
    display: flex;
    justify-content: center;
    align-items: center;
    min-height: 100vh;
    margin: 0;
  }
  .card {
    background: #fff;
    border-radius: 10px;
    box-shadow: 0 10px 40px rgba(0, 0, 0, 0.15);
    padding: 40px;
    width: 100%;
    max-width: 400px;
  }
  .badge {
    background: #fbbf24;
    color: #78350f;
    padding: 5px 10px;
    border-radius: 5px;
    text-align: center;
    margin-bottom: 20px;
    font-size: 12px;
    font-weight: bold;
  }
  .step { text-align: center; color: #666; margin-bottom: 20px; }
  label { display: block; margin-bottom: 5px; }
  input { width: 100%; padding: 12px; margin-bottom: 16px; box-sizing: border-box; }
  button { width: 100%; padding: 12px; font-weight: bold; cursor: pointer; }
  .code { font-family: monospace; font-size: 24px; text-align: center; user-select: all; }
</style>`;

function layout(title: string, body: Page): Page {
  return html`<!DOCTYPE html>
<html lang="ja">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${title} (Emulator)</title>
    ${STYLE}
  </head>
  <body>
    <div class="card">
      <div class="badge">EMULATOR MODE</div>
      ${body}
    </div>
  </body>
</html>`;
}

/** Step 1: email and password. */
export function credentialsPage(sessionId: string): Page {
  return layout(
    "ログイン",
    html`<div class="step">STEP 1 / 3</div>
      <form method="POST" action="/oauth/authorize/login">
        <label for="email">メールアドレス</label>
        <input type="email" id="email" name="email" required autofocus />
        <label for="password">パスワード</label>
        <input type="password" id="password" name="password" required />
        <input type="hidden" name="session_id" value="${sessionId}" />
        <button type="submit">ログイン</button>
      </form>`,
  );
}

/** Step 2: six digit one-time code. */
export function oneTimeCodePage(sessionId: string): Page {
  return layout(
    "二段階認証",
    html`<div class="step">STEP 2 / 3</div>
      <form method="POST" action="/oauth/authorize/2fa">
        <label for="otp">認証コード（6桁）</label>
        <input type="text" id="otp" name="otp" required autofocus maxlength="6" inputmode="numeric" />
        <input type="hidden" name="session_id" value="${sessionId}" />
        <button type="submit">認証</button>
      </form>`,
  );
}

/** Step 3: consent for the requesting client. */
export function consentPage(sessionId: string, clientId: string): Page {
  return layout(
    "アプリ認証",
    html`<div class="step">STEP 3 / 3</div>
      <p>アプリケーション <strong>${clientId}</strong> が以下の権限を要求しています：</p>
      <ul>
        <li>取引データの読み書き</li>
        <li>明細データの読み書き</li>
      </ul>
      <form method="POST" action="/oauth/authorize/confirm">
        <input type="hidden" name="session_id" value="${sessionId}" />
        <button type="submit">許可する</button>
      </form>`,
  );
}

/** Shown instead of a redirect for out-of-band clients. */
export function authorizationCodePage(code: string): Page {
  return layout(
    "認証コード",
    html`<p>認証が完了しました。以下の認証コードをアプリケーションに入力してください。</p>
      <div class="code" id="auth-code">${code}</div>
      <p>このコードは1回のみ有効です。</p>`,
  );
}
