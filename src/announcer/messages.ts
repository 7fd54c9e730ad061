/**
 * Announcement texts per language. Every table must cover every key.
 */

import type { Language } from '../types.js';

export type MessageKey =
  // Lifecycle events
  | 'Notification'
  | 'Stop'
  | 'SubagentStop'
  | 'UserPromptSubmit'
  | 'SessionStart'
  | 'SessionEnd'
  | 'PreCompact'
  // Tools
  | 'Edit'
  | 'MultiEdit'
  | 'Write'
  | 'NotebookEdit'
  | 'TodoWrite'
  | 'Task'
  | 'ExitPlanMode'
  | 'Read'
  | 'Grep'
  | 'LS'
  | 'Glob'
  | 'WebFetch'
  | 'WebSearch'
  | 'Bash'
  // Shell commands
  | 'git_commit'
  | 'git_push'
  | 'git_pull'
  | 'gh_pr'
  | 'test'
  | 'build'
  | 'docker'
  | 'npm'
  | 'python'
  // Fallbacks
  | 'tool_use'
  | 'tool_done'
  | 'generic';

const JAPANESE = {
  Notification: 'クロードが準備完了しました',
  Stop: 'タスクが完了しました',
  SubagentStop: 'サブタスクが完了しました',
  UserPromptSubmit: 'ユーザーがプロンプトを送信しました',
  SessionStart: 'セッションを開始しました',
  SessionEnd: 'セッションを終了しました',
  PreCompact: '会話を圧縮しています',

  Edit: 'ファイルを編集しています',
  MultiEdit: '複数の編集を実行しています',
  Write: 'ファイルを作成しています',
  NotebookEdit: 'ノートブックを編集しています',
  TodoWrite: 'タスクリストを更新しています',
  Task: 'タスクを実行しています',
  ExitPlanMode: '計画モードを終了しています',
  Read: 'ファイルを読み込んでいます',
  Grep: 'テキストを検索しています',
  LS: 'ディレクトリを一覧表示しています',
  Glob: 'ファイルパターンを検索しています',
  WebFetch: 'ウェブページを取得しています',
  WebSearch: 'ウェブ検索を実行しています',
  Bash: 'コマンドを実行しています',

  git_commit: 'Gitコミットを作成しています',
  git_push: '変更をプッシュしています',
  git_pull: '変更をプルしています',
  gh_pr: 'プルリクエストを作成しています',
  test: 'テストを実行しています',
  build: 'ビルドを実行しています',
  docker: 'Dockerコマンドを実行しています',
  npm: 'NPMコマンドを実行しています',
  python: 'Pythonスクリプトを実行しています',

  tool_use: 'ツールを使用しています',
  tool_done: 'ツールの実行が完了しました',
  generic: 'イベントを受信しました',
} satisfies Record<MessageKey, string>;

const ENGLISH = {
  Notification: 'Claude is ready',
  Stop: 'Task complete',
  SubagentStop: 'Subtask complete',
  UserPromptSubmit: 'Prompt submitted',
  SessionStart: 'Session started',
  SessionEnd: 'Session ended',
  PreCompact: 'Compacting the conversation',

  Edit: 'Editing a file',
  MultiEdit: 'Applying multiple edits',
  Write: 'Creating a file',
  NotebookEdit: 'Editing a notebook',
  TodoWrite: 'Updating the task list',
  Task: 'Running a task',
  ExitPlanMode: 'Leaving plan mode',
  Read: 'Reading a file',
  Grep: 'Searching text',
  LS: 'Listing a directory',
  Glob: 'Searching file patterns',
  WebFetch: 'Fetching a web page',
  WebSearch: 'Searching the web',
  Bash: 'Running a command',

  git_commit: 'Creating a git commit',
  git_push: 'Pushing changes',
  git_pull: 'Pulling changes',
  gh_pr: 'Creating a pull request',
  test: 'Running tests',
  build: 'Running a build',
  docker: 'Running a Docker command',
  npm: 'Running an npm command',
  python: 'Running a Python script',

  tool_use: 'Using a tool',
  tool_done: 'Tool finished',
  generic: 'Event received',
} satisfies Record<MessageKey, string>;

export const MESSAGES: Record<Language, Readonly<Record<MessageKey, string>>> = {
  ja: JAPANESE,
  en: ENGLISH,
};

export function messageFor(key: MessageKey, language: Language): string {
  return MESSAGES[language][key];
}
