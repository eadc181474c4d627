import * as vscode from 'vscode';
import { type ConfigurationOptions, optionsFromSettings } from './configuration';
import { EnableFlag, RelativeLineController } from './eventBinding';
import { DEFAULT_NAMESPACE, InMemoryOverlayPrimitive, OverlayStore } from './overlayStore';
import { VsCodeEditorHost } from './vscodeHost';

const CONFIG_SECTION = 'relativeLineAnnotations';

// Lives for the whole extension host session
const enableFlag = new EnableFlag(true);

let controller: RelativeLineController | undefined;
let host: VsCodeEditorHost | undefined;

function readOptions(): ConfigurationOptions {
	return optionsFromSettings(vscode.workspace.getConfiguration(CONFIG_SECTION));
}

// This method is called when your extension is activated
export function activate(context: vscode.ExtensionContext) {
	const primitive = new InMemoryOverlayPrimitive();
	host = new VsCodeEditorHost(primitive, DEFAULT_NAMESPACE);
	const editorHost = host;

	controller = new RelativeLineController(
		editorHost,
		new OverlayStore(primitive, DEFAULT_NAMESPACE),
		enableFlag,
		readOptions()
	);
	const activeController = controller;
	activeController.attach();

	const toggleCommand = vscode.commands.registerCommand(`${CONFIG_SECTION}.toggle`, () => {
		const enabled = activeController.toggle();
		vscode.window.setStatusBarMessage(`Relative line annotations ${enabled ? 'on' : 'off'}`, 2000);
	});

	// Re-run setup whenever our settings change
	const onDidChangeConfiguration = vscode.workspace.onDidChangeConfiguration(event => {
		if (event.affectsConfiguration(CONFIG_SECTION)) {
			console.log('Configuration changed, re-running setup');
			activeController.setup(readOptions());
		}
	});

	context.subscriptions.push(toggleCommand);
	context.subscriptions.push(onDidChangeConfiguration);

	// Draw the editor that is already open
	activeController.refreshCurrentWindow();
	console.log('Relative line annotations are now active');
}

// This method is called when your extension is deactivated
export function deactivate() {
	controller?.dispose();
	host?.dispose();
	controller = undefined;
	host = undefined;
}
