import { UploadInference } from "@/components/UploadInference";

export default function Home() {
  return (
    <div className="min-h-screen bg-slate-50 text-slate-900">
      <main className="mx-auto flex w-full max-w-5xl flex-col gap-8 px-4 pb-16 pt-10 md:px-8">
        <header className="flex flex-col gap-3">
          <span className="inline-flex w-fit items-center gap-2 rounded-full border border-slate-200 bg-white px-3 py-1 text-xs font-medium text-slate-600">
            <span className="h-2 w-2 rounded-full bg-indigo-500" /> Sales upload analyzer
          </span>
          <h1 className="text-3xl font-semibold tracking-tight md:text-4xl">Upload a sales export, get clean totals.</h1>
          <p className="max-w-3xl text-sm text-slate-600 md:text-base">
            We find the header row and the sales and bill columns, drop blank, total and summary rows, then report
            total sales and bill counts. Layouts you have uploaded before are recognized instantly.
          </p>
        </header>

        <section className="rounded-2xl border border-slate-200 bg-white p-5 shadow-lg">
          <UploadInference />
        </section>
      </main>
    </div>
  );
}
