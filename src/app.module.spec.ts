import { AppModule } from './app.module';
import { WorkerModule } from './worker/worker.module';

describe('AppModule', () => {
  it('should be defined', () => {
    expect(AppModule).toBeDefined();
  });

  it('should import configuration and the worker', () => {
    const imports: unknown[] = Reflect.getMetadata('imports', AppModule);

    expect(imports).toHaveLength(2);
    expect(imports).toContain(WorkerModule);
  });
});
