import {chmod, mkdir, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {ArtifactError} from '../errors.js'
import type {Reporter} from '../core/reporter.js'
import {shellQuote} from '../core/utils.js'
import type {AutostartArtifact, HostPaths, PipelineContext} from '../types.js'

const executableMode = 0o755

type ArtifactPaths = Pick<AutostartArtifact, 'launcherPath' | 'autostartEntryPath' | 'desktopShortcutPath'>

export function artifactPaths(context: PipelineContext, hostPaths: Readonly<HostPaths>): ArtifactPaths {
  const {launcher} = context.config
  return {
    launcherPath: join(hostPaths.homeDir, launcher.fileName),
    autostartEntryPath: join(hostPaths.homeDir, '.config', 'autostart', `${launcher.autostartName}.desktop`),
    desktopShortcutPath: join(hostPaths.homeDir, 'Desktop', `${launcher.shortcutName}.desktop`)
  }
}

/**
 * Launcher script for the graphical session. It relies only on the variables
 * it exports itself and on the inherited `HOME`; library and plugin search
 * paths are prefixed onto whatever the session already set.
 */
export function renderLauncher(context: PipelineContext, hostPaths: Readonly<HostPaths>): string {
  const {acceleration, display, launcher} = context.config
  const libDir = `$HAILO_SDK_PATH/lib/${acceleration.libArch}`
  const terminalScript = [
    'echo "Changing to application directory..."',
    'cd "$APP_DIR" || exit 1',
    'echo "Starting application..."',
    launcher.startCommand
  ].join('; ')

  return [
    '#!/bin/sh',
    '',
    `export HAILO_SDK_PATH=${shellQuote(acceleration.sdkPath)}`,
    `export GST_PLUGIN_PATH="${libDir}/gstreamer-1.0\${GST_PLUGIN_PATH:+:$GST_PLUGIN_PATH}"`,
    `export LD_LIBRARY_PATH="${libDir}\${LD_LIBRARY_PATH:+:$LD_LIBRARY_PATH}"`,
    '',
    'echo "GST_PLUGIN_PATH: $GST_PLUGIN_PATH"',
    'echo "LD_LIBRARY_PATH: $LD_LIBRARY_PATH"',
    '',
    '# Let the desktop session finish starting',
    `sleep ${launcher.startupDelaySeconds}`,
    '',
    `export DISPLAY=${shellQuote(display.display)}`,
    'export XAUTHORITY="$HOME/.Xauthority"',
    `export APP_DIR=${shellQuote(hostPaths.appDir)}`,
    '',
    `exec xterm -display "$DISPLAY" -hold -e sh -c ${shellQuote(terminalScript)}`,
    ''
  ].join('\n')
}

export function renderAutostartEntry(context: PipelineContext, launcherPath: string): string {
  return [
    '[Desktop Entry]',
    'Type=Application',
    `Name=${context.config.launcher.displayName}`,
    `Exec=${desktopExec(launcherPath)}`,
    'X-GNOME-Autostart-enabled=true',
    'Terminal=false',
    ''
  ].join('\n')
}

export function renderDesktopShortcut(context: PipelineContext, launcherPath: string): string {
  return [
    '[Desktop Entry]',
    'Version=1.0',
    'Type=Application',
    `Name=Start ${context.config.launcher.displayName}`,
    'Comment=Launch the application',
    `Exec=${desktopExec(launcherPath)}`,
    'Icon=terminal',
    'Terminal=false',
    'Categories=Application;',
    ''
  ].join('\n')
}

/** `Exec=` value running the launcher, quoted per the desktop entry format. */
export function desktopExec(launcherPath: string): string {
  if (!/[\s"'`$\\]/.test(launcherPath)) {
    return `/bin/sh ${launcherPath}`
  }

  const escaped = launcherPath.replaceAll(/["`$\\]/g, character => `\\${character}`)
  return `/bin/sh "${escaped}"`
}

/**
 * Writes the launcher, the session autostart entry and the desktop shortcut.
 * Runs after the service is registered, so a failure here only affects
 * launching from the desktop.
 */
export class ArtifactGenerator {
  constructor(
    private readonly context: PipelineContext,
    private readonly reporter: Reporter
  ) {}

  async generate(hostPaths: Readonly<HostPaths> = this.context.hostPaths): Promise<AutostartArtifact> {
    const paths = artifactPaths(this.context, hostPaths)

    await writeExecutable(paths.launcherPath, renderLauncher(this.context, hostPaths))
    await writeExecutable(paths.autostartEntryPath, renderAutostartEntry(this.context, paths.launcherPath))
    await writeExecutable(paths.desktopShortcutPath, renderDesktopShortcut(this.context, paths.launcherPath))

    this.reporter.emit({
      event: 'ARTIFACTS_GENERATED',
      paths: [paths.launcherPath, paths.autostartEntryPath, paths.desktopShortcutPath]
    })

    return {
      ...paths,
      displayEnv: {
        DISPLAY: this.context.config.display.display,
        XAUTHORITY: join(hostPaths.homeDir, '.Xauthority')
      }
    }
  }
}

async function writeExecutable(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), {recursive: true})
    await writeFile(path, content, {encoding: 'utf8', mode: executableMode})
    // mode above only applies when the file is created
    await chmod(path, executableMode)
  } catch (error) {
    throw new ArtifactError(path, {cause: error})
  }
}
