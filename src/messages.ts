// Notification texts, one catalog per language

export type MessageId =
  | 'service.started.title'
  | 'service.started.body'
  | 'service.stopped.title'
  | 'service.stopped.body'
  | 'archived.title'
  | 'archived.body'
  | 'archivedWithoutPrinting.title'
  | 'archivedWithoutPrinting.body'
  | 'printStarted.title'
  | 'printStarted.body'
  | 'lockTimeout.title'
  | 'lockTimeout.body'
  | 'destinationExists.title'
  | 'destinationExists.body'
  | 'moveFailed.title'
  | 'moveFailed.body'
  | 'printFailed.title'
  | 'printFailed.body'
  | 'processingFailed.title'
  | 'processingFailed.body'
  | 'confirm.question';

export type MessageCatalog = Record<MessageId, string>;

const en: MessageCatalog = {
  'service.started.title': 'AutoPrint and Archive',
  'service.started.body': 'Watching {directory}',
  'service.stopped.title': 'AutoPrint and Archive',
  'service.stopped.body': 'Stopped watching {directory}',
  'archived.title': 'File archived',
  'archived.body': '{file} moved to {destination}',
  'archivedWithoutPrinting.title': 'Archived without printing',
  'archivedWithoutPrinting.body': '{file} was archived and not printed',
  'printStarted.title': 'Printing',
  'printStarted.body': '{file} sent to {printer}',
  'lockTimeout.title': 'File still in use',
  'lockTimeout.body': '{file} stayed locked and was left in place',
  'destinationExists.title': 'Already archived',
  'destinationExists.body': '{file} already exists in {destination}',
  'moveFailed.title': 'Archiving failed',
  'moveFailed.body': 'Could not move {file}: {reason}',
  'printFailed.title': 'Printing failed',
  'printFailed.body': 'Could not print {file}: {reason}',
  'processingFailed.title': 'Processing failed',
  'processingFailed.body': '{file}: {reason}',
  'confirm.question': 'Print {file}? [y/N] ',
};

const de: MessageCatalog = {
  'service.started.title': 'AutoPrint and Archive',
  'service.started.body': 'Überwache {directory}',
  'service.stopped.title': 'AutoPrint and Archive',
  'service.stopped.body': 'Überwachung von {directory} beendet',
  'archived.title': 'Datei archiviert',
  'archived.body': '{file} nach {destination} verschoben',
  'archivedWithoutPrinting.title': 'Archiviert ohne Druck',
  'archivedWithoutPrinting.body': '{file} wurde archiviert und nicht gedruckt',
  'printStarted.title': 'Drucken',
  'printStarted.body': '{file} an {printer} gesendet',
  'lockTimeout.title': 'Datei noch in Benutzung',
  'lockTimeout.body': '{file} blieb gesperrt und wurde nicht verschoben',
  'destinationExists.title': 'Bereits archiviert',
  'destinationExists.body': '{file} existiert bereits in {destination}',
  'moveFailed.title': 'Archivieren fehlgeschlagen',
  'moveFailed.body': '{file} konnte nicht verschoben werden: {reason}',
  'printFailed.title': 'Drucken fehlgeschlagen',
  'printFailed.body': '{file} konnte nicht gedruckt werden: {reason}',
  'processingFailed.title': 'Verarbeitung fehlgeschlagen',
  'processingFailed.body': '{file}: {reason}',
  'confirm.question': '{file} drucken? [j/N] ',
};

const CATALOGS: Record<string, MessageCatalog> = { en, de };

export class Messages {
  public readonly language: string;
  private readonly catalog: MessageCatalog;

  constructor(language: string) {
    const base = language.toLowerCase().split(/[-_]/)[0];
    const catalog = CATALOGS[base];
    this.language = catalog ? base : 'en';
    this.catalog = catalog ?? en;
  }

  format(id: MessageId, params: Record<string, string> = {}): string {
    return this.catalog[id].replace(/\{(\w+)\}/g, (placeholder, name: string) =>
      Object.hasOwn(params, name) ? params[name] : placeholder
    );
  }
}
