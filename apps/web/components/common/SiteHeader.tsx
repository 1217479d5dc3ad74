// apps/web/components/common/SiteHeader.tsx
import Link from "next/link";
import { getSiteConfig } from "@/lib/site-config";
import { getSite } from "@/lib/store";
import { getOptionalAdmin } from "@/lib/auth/server";

export default async function SiteHeader() {
  const { siteTitle } = getSiteConfig();
  const [settings, admin] = await Promise.all([
    getSite().loadSettings(),
    getOptionalAdmin(),
  ]);

  // URL が空のリンク（未設定の SNS など）は出さない
  const navLinks = settings.nav_links.filter((l) => l.url);

  return (
    <header className="border-b border-black/5">
      <div className="container-blog flex flex-wrap items-center justify-between gap-3 py-4">
        <div>
          <Link href="/" className="font-semibold tracking-tight">
            {siteTitle}
          </Link>
          {settings.main_title && (
            <p className="text-xs text-gray-500">{settings.main_title}</p>
          )}
        </div>

        <nav className="text-sm">
          <ul className="flex flex-wrap items-center gap-4">
            {navLinks.map((link) => (
              <li key={`${link.label}:${link.url}`}>
                <a
                  href={link.url}
                  target={link.target}
                  rel={link.target === "_blank" ? "noopener noreferrer" : undefined}
                  className="text-gray-700 hover:text-brand-600"
                >
                  {link.label}
                </a>
              </li>
            ))}
            {admin && (
              <>
                <li>
                  <Link href="/admin/posts" className="text-gray-700 hover:text-brand-600">
                    Admin
                  </Link>
                </li>
                <li>
                  <a href="/logout" className="text-gray-700 hover:text-brand-600">
                    Logout
                  </a>
                </li>
              </>
            )}
          </ul>
        </nav>
      </div>
    </header>
  );
}
