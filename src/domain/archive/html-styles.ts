export const ARCHIVE_STYLES = `    <style>
        body {
            font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif;
            background: #313338;
            color: #dbdee1;
            margin: 0;
            padding: 24px;
            line-height: 1.5;
        }
        .header {
            background: #2b2d31;
            border-bottom: 3px solid #5865f2;
            padding: 20px 24px;
            margin: -24px -24px 24px;
        }
        .header h1 { margin: 0 0 8px; color: #ffffff; font-size: 26px; }
        .header p { margin: 4px 0; color: #b5bac1; }
        .message-count { color: #949cf7; font-weight: bold; }
        .messages-container { max-width: 1100px; margin: 0 auto; }
        .message {
            background: #383a40;
            margin: 12px 0;
            padding: 14px 18px;
            border-radius: 8px;
            border-left: 4px solid #5865f2;
        }
        .message-header { margin-bottom: 6px; }
        .author { font-weight: bold; color: #949cf7; }
        .timestamp { color: #949ba4; font-size: 12px; margin-left: 10px; }
        .content { word-wrap: break-word; }
        .attachments, .embeds { margin-top: 10px; }
        .attachment {
            display: inline-block;
            background: #2b2d31;
            padding: 6px 12px;
            margin: 4px 4px 0 0;
            border-radius: 4px;
        }
        .attachment a, .embed-title a { color: #00a8fc; text-decoration: none; }
        .attachment a:hover, .embed-title a:hover { text-decoration: underline; }
        .attachment-size { color: #949ba4; font-size: 12px; margin-left: 6px; }
        .embed {
            background: #2b2d31;
            padding: 12px;
            margin: 6px 0;
            border-radius: 4px;
            border-left: 4px solid #4e5058;
        }
        .embed-title { font-weight: bold; color: #ffffff; margin-bottom: 4px; }
        .embed-description { margin-bottom: 8px; }
        .embed-fields { display: flex; flex-wrap: wrap; gap: 8px; }
        .embed-field { flex: 1 1 100%; min-width: 180px; }
        .embed-field.inline { flex: 1 1 30%; }
        .embed-field-name { font-weight: bold; color: #b5bac1; }
        .embed-footer { color: #949ba4; font-size: 12px; margin-top: 8px; }
        @media (max-width: 768px) {
            body { padding: 12px; }
            .header { margin: -12px -12px 12px; }
            .embed-field.inline { flex: 1 1 100%; }
        }
    </style>`;
