import pino, {type DestinationStream, type LevelWithSilent, type Logger} from 'pino';

export type {Logger};

export type LoggerOptions = {
	level?: LevelWithSilent;
	file?: string;
	destination?: DestinationStream;
};

// stdout belongs to the reports summary and the terminal UI, so logs go to stderr or a file.
const openDestination = (file: string | undefined) =>
	file
		? pino.destination({dest: file, mkdir: true, sync: true})
		: pino.destination({dest: 2, sync: true});

export const createLogger = ({level = 'info', file, destination}: LoggerOptions = {}): Logger =>
	pino(
		{
			level,
			base: {service: 'vmx-agent'},
			timestamp: pino.stdTimeFunctions.isoTime,
		},
		destination ?? openDestination(file),
	);

export const silentLogger: Logger = pino({level: 'silent'});
