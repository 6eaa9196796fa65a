/**
 * Login screen view
 *
 * Pure rendering of GreeterController state; all input goes through the
 * controller.
 */

import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { GreeterController } from '@modegreet/greeter';
import { Header } from '../components/Header.js';
import { Field } from '../components/Field.js';
import { StatusBar } from '../components/StatusBar.js';
import { ConfirmDialog } from '../components/ConfirmDialog.js';
import { HelpOverlay, type HelpEntry } from '../components/HelpOverlay.js';
import { PickerList } from '../components/PickerList.js';

interface LoginScreenProps {
  controller: GreeterController;
  hostname: string;
  demo: boolean;
  columns: number;
  rows: number;
}

const HELP: HelpEntry[] = [
  ['i a A I', 'Edit the field (Insert mode)'],
  ['Esc', 'Back to Normal mode'],
  ['j k Tab', 'Switch field'],
  ['h l 0 $', 'Move the cursor'],
  ['x dd', 'Delete character / clear field'],
  ['Enter', 'Next field or log in'],
  [':session NAME', 'Choose a session'],
  [':user NAME', 'Choose a user'],
  [':reboot', 'Reboot the machine'],
  [':poweroff', 'Power off the machine'],
  ['F2 / F3', 'User / session picker'],
  ['Ctrl-C', 'Cancel a login in progress'],
];

function Overlay({ controller, rows }: { controller: GreeterController; rows: number }) {
  const overlay = controller.overlay;
  switch (overlay.kind) {
    case 'help':
      return <HelpOverlay title="Login help" entries={HELP} />;
    case 'confirm':
      return <ConfirmDialog question={overlay.action === 'reboot' ? 'Reboot now?' : 'Power off now?'} />;
    case 'session-picker':
      return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2}>
          <Text bold color="cyan">
            Sessions
          </Text>
          <PickerList
            items={controller.sessions.map((s) => `${s.name} (${s.sessionType})`)}
            selected={controller.selectedSession}
            height={rows - 10}
            emptyText="No sessions found"
          />
        </Box>
      );
    case 'user-picker':
      return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2}>
          <Text bold color="cyan">
            Users
          </Text>
          <PickerList
            items={controller.users.map((u) => (u.displayName ? `${u.username} (${u.displayName})` : u.username))}
            selected={controller.selectedUser}
            height={rows - 10}
            emptyText="No users found"
          />
        </Box>
      );
    case 'none':
      return null;
  }
}

export function LoginScreen({ controller, hostname, demo, columns, rows }: LoginScreenProps) {
  const session = controller.currentSession;
  const mode = controller.mode;
  const hints =
    mode === 'insert'
      ? { left: 'Enter: next / login', right: 'Esc: normal  F1: help' }
      : { left: 'i: edit  j/k: field', right: ':help  F3: sessions  F12: power' };

  return (
    <Box flexDirection="column" width={columns} height={rows} paddingX={1}>
      <Header title={hostname} subtitle={demo ? 'Demo mode: any user, password "demo"' : undefined} />

      <Box flexDirection="column" flexGrow={1} alignItems="center" justifyContent="center">
        {controller.overlay.kind === 'none' ? (
          <Box flexDirection="column">
            <Field
              label="Username"
              buffer={controller.username}
              focused={controller.focus === 'username'}
              mode={mode}
            />
            <Field
              label="Password"
              buffer={controller.password}
              focused={controller.focus === 'password'}
              mode={mode}
            />
            <Box marginTop={1}>
              <Box width={12}>
                <Text color="gray">Session</Text>
              </Box>
              <Text color={session ? 'white' : 'red'}>
                {session ? `${session.name} (${session.sessionType})` : 'none found'}
              </Text>
            </Box>
            {controller.working && (
              <Box marginTop={1}>
                <Text color="cyan">
                  <Spinner type="dots" />
                </Text>
                <Text> Authenticating...</Text>
              </Box>
            )}
          </Box>
        ) : (
          <Overlay controller={controller} rows={rows} />
        )}
      </Box>

      <StatusBar
        mode={mode}
        commandLine={controller.input.commandLine.content()}
        message={controller.message}
        left={hints.left}
        right={hints.right}
      />
    </Box>
  );
}
