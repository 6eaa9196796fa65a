/**
 * Onboarding wizard view
 *
 * Sidebar of steps on the left, the selected step on the right, status bar
 * at the bottom. Renders OnboardController state only.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OnboardController } from '@modegreet/onboard';
import { Header } from '../components/Header.js';
import { Field } from '../components/Field.js';
import { StatusBar } from '../components/StatusBar.js';
import { ConfirmDialog } from '../components/ConfirmDialog.js';
import { HelpOverlay, type HelpEntry } from '../components/HelpOverlay.js';
import { PickerList } from '../components/PickerList.js';
import { StepList } from './StepList.js';
import { TaskList } from './TaskList.js';

interface WizardScreenProps {
  controller: OnboardController;
  columns: number;
  rows: number;
}

const HELP: HelpEntry[] = [
  ['j k', 'Move between steps or items'],
  ['l Enter', 'Open the selected step'],
  ['h Esc Ctrl-H', 'Back to the step list'],
  ['1-9', 'Jump to a step'],
  ['i', 'Edit the focused field'],
  ['Space', 'Toggle a package or category'],
  [':next', 'Go to the next step'],
  [':skip', 'Skip an optional step'],
  [':submit', 'Run the current step'],
  [':finish', 'Finish setup'],
  [':cancel', 'Leave the wizard'],
  ['F12', 'Power off'],
];

const CONFIRM_QUESTIONS = {
  reboot: 'Reboot now?',
  poweroff: 'Power off now?',
  cancel: 'Exit the setup wizard?',
};

function Welcome({ controller }: { controller: OnboardController }) {
  return (
    <Box flexDirection="column" alignItems="center" justifyContent="center" flexGrow={1}>
      <Text bold color="cyan">
        {controller.config.general.title}
      </Text>
      <Text color="gray">{controller.config.general.subtitle}</Text>
      <Box marginTop={1}>
        <Text>
          Press <Text color="green">Enter</Text> to begin
        </Text>
      </Box>
      {controller.dryRun && (
        <Box marginTop={1}>
          <Text color="yellow">Dry run: nothing on this system will be changed</Text>
        </Box>
      )}
    </Box>
  );
}

function UserStep({ controller }: { controller: OnboardController }) {
  const focus = controller.contentFocus;
  const fields = [
    { label: 'Username', buffer: controller.username },
    { label: 'Password', buffer: controller.password },
    { label: 'Confirm', buffer: controller.passwordConfirm },
  ];

  return (
    <Box flexDirection="column">
      <Text bold>Create your account</Text>
      {fields.map((field, index) => (
        <Field
          key={field.label}
          label={field.label}
          buffer={field.buffer}
          focused={controller.panelFocus === 'content' && focus.kind === 'field' && focus.index === index}
          mode={controller.mode}
        />
      ))}
      <Text color="gray">Groups: {controller.config.user.groups.join(', ') || 'none'}</Text>
      {controller.tasks.length > 0 && <TaskList tasks={controller.tasks} />}
    </Box>
  );
}

function PickerStep({ controller, title, current, rows }: { controller: OnboardController; title: string; current?: string; rows: number }) {
  const filter = controller.pickerFilter.content();
  const focused = controller.panelFocus === 'content' && controller.contentFocus.kind === 'picker';

  return (
    <Box flexDirection="column">
      <Text bold>{title}</Text>
      <Text color="gray">Current: {current ?? 'not set'}</Text>
      <Box marginY={1}>
        <Text color={focused && controller.mode === 'insert' ? 'green' : 'gray'}>Filter: </Text>
        <Text>{filter}</Text>
        {focused && controller.mode === 'insert' && <Text inverse> </Text>}
      </Box>
      {controller.pickerItems.length === 0 ? (
        <Text color="gray">Loading...</Text>
      ) : (
        <PickerList items={controller.filteredPickerItems()} selected={controller.pickerSelected} height={rows - 14} />
      )}
    </Box>
  );
}

function NetworkStep({ controller }: { controller: OnboardController }) {
  return (
    <Box flexDirection="column">
      <Text bold>Network</Text>
      {controller.networkConnected ? (
        <Text color="green">● Connected</Text>
      ) : (
        <Box flexDirection="column">
          <Text color="red">○ Not connected</Text>
          <Text color="gray">Enter opens {controller.config.network.program} to configure a connection.</Text>
        </Box>
      )}
    </Box>
  );
}

function ReviewStep({ controller }: { controller: OnboardController }) {
  const rows: Array<[string, string]> = [
    ['Username', controller.username.content() || '(not set)'],
    ['Groups', controller.config.user.groups.join(', ')],
    ['Shell', controller.config.user.shell],
    ['Locale', controller.selectedLocale ?? '(unchanged)'],
    ['Keyboard', controller.selectedKeyboard ?? '(unchanged)'],
    ['Timezone', controller.selectedTimezone ?? '(unchanged)'],
  ];

  return (
    <Box flexDirection="column">
      <Text bold>Review</Text>
      <Box flexDirection="column" marginTop={1}>
        {rows.map(([label, value]) => (
          <Box key={label}>
            <Box width={12}>
              <Text color="gray">{label}</Text>
            </Box>
            <Text>{value}</Text>
          </Box>
        ))}
      </Box>
      {controller.tasks.length > 0 && <TaskList tasks={controller.tasks} />}
    </Box>
  );
}

function UpdateStep({ controller }: { controller: OnboardController }) {
  if (controller.isExecuting || controller.ledger.resultOf('update') === 'completed') {
    return (
      <Box flexDirection="column">
        <Text bold>Installing packages</Text>
        <TaskList tasks={controller.tasks} />
      </Box>
    );
  }

  const selection = controller.packages;
  const focus = controller.contentFocus;
  const content = controller.panelFocus === 'content';
  const askPassword = !controller.dryRun && controller.sudoNeeded && !controller.sudoEntered;

  return (
    <Box flexDirection="column">
      <Text bold>Packages</Text>
      {selection.categories.map((category, c) => {
        const mark = selection.isCategoryFullySelected(c) ? '[x]' : selection.isCategoryPartiallySelected(c) ? '[-]' : '[ ]';
        const headerFocused = content && controller.updateCategory === c && controller.updatePackage === null;
        return (
          <Box key={category.name} flexDirection="column" marginTop={1}>
            <Text color={headerFocused ? 'cyan' : undefined} bold>
              {headerFocused ? '› ' : '  '}
              {mark} {category.name}
              {category.description ? <Text color="gray"> {category.description}</Text> : null}
            </Text>
            {category.packages.map((pkg, p) => {
              const focused = content && controller.updateCategory === c && controller.updatePackage === p;
              return (
                <Text key={pkg.title} color={focused ? 'cyan' : undefined}>
                  {focused ? '›   ' : '    '}
                  {selection.isSelected(c, p) ? '[x]' : '[ ]'} {pkg.title}
                  {pkg.required ? <Text color="yellow"> (required)</Text> : null}
                  {pkg.description ? <Text color="gray"> {pkg.description}</Text> : null}
                </Text>
              );
            })}
          </Box>
        );
      })}
      {askPassword && (
        <Box marginTop={1}>
          <Field
            label="Sudo pass"
            buffer={controller.sudoPassword}
            focused={content && focus.kind === 'field'}
            mode={controller.mode}
          />
        </Box>
      )}
      {controller.tasks.length > 0 && <TaskList tasks={controller.tasks} />}
    </Box>
  );
}

function RebootStep({ controller }: { controller: OnboardController }) {
  return (
    <Box flexDirection="column">
      <Text bold>Finish</Text>
      <Text>Setup is ready. Enter finishes and {controller.config.completion.action}s the system.</Text>
      {controller.tasks.length > 0 && <TaskList tasks={controller.tasks} />}
    </Box>
  );
}

function StepContent({ controller, rows }: { controller: OnboardController; rows: number }) {
  if (controller.ledger.isLocked(controller.selectedStep)) {
    return (
      <Box flexDirection="column">
        <Text color="gray">This step is locked.</Text>
        <Text color="gray">Complete previous steps first.</Text>
      </Box>
    );
  }

  switch (controller.currentStepId) {
    case 'user':
      return <UserStep controller={controller} />;
    case 'locale':
      return <PickerStep controller={controller} title="Language" current={controller.selectedLocale} rows={rows} />;
    case 'keyboard':
      return <PickerStep controller={controller} title="Keyboard layout" current={controller.selectedKeyboard} rows={rows} />;
    case 'preferences':
      return <PickerStep controller={controller} title="Timezone" current={controller.selectedTimezone} rows={rows} />;
    case 'network':
      return <NetworkStep controller={controller} />;
    case 'review':
      return <ReviewStep controller={controller} />;
    case 'update':
      return <UpdateStep controller={controller} />;
    case 'reboot':
      return <RebootStep controller={controller} />;
    default:
      return null;
  }
}

export function WizardScreen({ controller, columns, rows }: WizardScreenProps) {
  const hints = controller.statusHints();
  const started = controller.panelFocus !== 'welcome';

  let body: React.ReactNode;
  if (controller.confirm !== null) {
    body = <ConfirmDialog question={CONFIRM_QUESTIONS[controller.confirm]} />;
  } else if (controller.showHelp) {
    body = <HelpOverlay title="Setup help" entries={HELP} />;
  } else if (!started) {
    body = <Welcome controller={controller} />;
  } else {
    body = (
      <Box flexGrow={1}>
        <StepList
          menu={controller.menu}
          results={controller.ledger.snapshot()}
          selected={controller.selectedStep}
          focused={controller.panelFocus === 'sidebar'}
          busyFrame={controller.isExecuting ? controller.spinner : null}
        />
        <Box
          flexDirection="column"
          flexGrow={1}
          borderStyle="round"
          borderColor={controller.panelFocus === 'content' ? 'cyan' : 'gray'}
          paddingX={1}
        >
          <StepContent controller={controller} rows={rows} />
        </Box>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" width={columns} height={rows} paddingX={1}>
      <Header title={controller.config.general.title} subtitle={started ? undefined : controller.config.general.subtitle} />
      <Box flexDirection="column" flexGrow={1} alignItems={started ? undefined : 'center'} justifyContent="center">
        {body}
      </Box>
      <StatusBar
        mode={controller.mode}
        commandLine={controller.input.commandLine.content()}
        message={controller.message}
        left={hints.left}
        right={hints.right}
      />
    </Box>
  );
}
